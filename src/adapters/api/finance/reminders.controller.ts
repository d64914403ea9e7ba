// src/adapters/api/finance/reminders.controller.ts
import type { UsecaseSession } from '@app-types/auth/session.types';
import { AccessRole } from '@app-types/models/account.types';
import { ReminderService } from '@modules/finance/reminder.service';
import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Query,
} from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { SendReminderUsecase } from '@usecases/finance/send-reminder.usecase';
import { currentSession } from '../decorators/current-user.decorator';
import { Roles } from '../decorators/roles.decorator';
import { mapPage, type ListResponse } from '../dto/detail.dto';
import { toSearchParams } from '../dto/list-query.dto';
import { CreateReminderDto, ReminderQueryDto, UpdateReminderDto } from './dto/ledger.dto';
import { toReminderView, type ReminderView } from './finance.presenter';

@ApiTags('finance')
@ApiBearerAuth()
@Controller('finance/reminders')
export class RemindersController {
  constructor(
    private readonly reminderService: ReminderService,
    private readonly sendReminderUsecase: SendReminderUsecase,
  ) {}

  @Get()
  async list(@Query() query: ReminderQueryDto): Promise<ListResponse<ReminderView>> {
    const page = await this.reminderService.search(
      toSearchParams(query, {
        status: query.status,
        studentId: query.student,
        courseId: query.course,
      }),
    );
    return mapPage(page, toReminderView);
  }

  @Get(':id')
  async get(@Param('id', ParseIntPipe) id: number): Promise<ReminderView> {
    return toReminderView(await this.reminderService.getOrThrow(id));
  }

  @Roles(AccessRole.STAFF)
  @Post()
  async create(
    @currentSession() session: UsecaseSession,
    @Body() body: CreateReminderDto,
  ): Promise<ReminderView> {
    return toReminderView(await this.reminderService.create(body, session.accountId));
  }

  @Roles(AccessRole.STAFF)
  @Patch(':id')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() body: UpdateReminderDto,
  ): Promise<ReminderView> {
    return toReminderView(await this.reminderService.update(id, body));
  }

  @Roles(AccessRole.STAFF)
  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseIntPipe) id: number): Promise<void> {
    await this.reminderService.remove(id);
  }

  /** 立即发送提醒邮件并回写状态 */
  @Roles(AccessRole.STAFF)
  @Post(':id/send')
  @HttpCode(HttpStatus.OK)
  async send(@Param('id', ParseIntPipe) id: number): Promise<ReminderView> {
    return toReminderView(await this.sendReminderUsecase.execute(id));
  }
}
