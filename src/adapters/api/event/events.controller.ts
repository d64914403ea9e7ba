// src/adapters/api/event/events.controller.ts
import type { UsecaseSession } from '@app-types/auth/session.types';
import { AccessRole } from '@app-types/models/account.types';
import { displayName } from '@modules/account/user.entity';
import type { EventEntity } from '@modules/event/event.entity';
import { EventService } from '@modules/event/event.service';
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
import { SaveEventUsecase } from '@usecases/event/save-event.usecase';
import { currentSession, optionalSession } from '../decorators/current-user.decorator';
import { Public } from '../decorators/public.decorator';
import { Roles } from '../decorators/roles.decorator';
import { mapPage, type ListResponse } from '../dto/detail.dto';
import { ListQueryDto, toSearchParams } from '../dto/list-query.dto';
import { CreateEventDto, UpdateEventDto } from './dto/event.dto';

export interface EventView {
  readonly id: number;
  readonly title: string;
  readonly description: string | null;
  readonly startDate: string;
  readonly endDate: string;
  readonly createdById: number | null;
  readonly createdByName: string | null;
  readonly createdAt: Date;
}

export function toEventView(event: EventEntity): EventView {
  return {
    id: event.id,
    title: event.title,
    description: event.description,
    startDate: event.startDate,
    endDate: event.endDate,
    createdById: event.createdById,
    createdByName: event.createdBy ? displayName(event.createdBy) : null,
    createdAt: event.createdAt,
  };
}

/**
 * 活动公告：列表与详情公开（员工可见历史活动），写需管理员
 */
@ApiTags('events')
@ApiBearerAuth()
@Controller('events')
export class EventsController {
  constructor(
    private readonly eventService: EventService,
    private readonly saveEventUsecase: SaveEventUsecase,
  ) {}

  @Public()
  @Get()
  async list(
    @optionalSession() session: UsecaseSession | null,
    @Query() query: ListQueryDto,
  ): Promise<ListResponse<EventView>> {
    const page = await this.saveEventUsecase.list(session, toSearchParams(query));
    return mapPage(page, toEventView);
  }

  @Public()
  @Get(':id')
  async get(
    @optionalSession() session: UsecaseSession | null,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<EventView> {
    return toEventView(await this.saveEventUsecase.get(session, id));
  }

  @Roles(AccessRole.ADMIN)
  @Post()
  async create(
    @currentSession() session: UsecaseSession,
    @Body() body: CreateEventDto,
  ): Promise<EventView> {
    return toEventView(await this.saveEventUsecase.create(session, body));
  }

  @Roles(AccessRole.ADMIN)
  @Patch(':id')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() body: UpdateEventDto,
  ): Promise<EventView> {
    return toEventView(await this.saveEventUsecase.update(id, body));
  }

  @Roles(AccessRole.ADMIN)
  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseIntPipe) id: number): Promise<void> {
    await this.eventService.remove(id);
  }
}
