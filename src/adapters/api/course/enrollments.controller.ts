// src/adapters/api/course/enrollments.controller.ts
import type { UsecaseSession } from '@app-types/auth/session.types';
import { AccessRole } from '@app-types/models/account.types';
import { AttendanceService } from '@modules/attendance/attendance.service';
import type { EnrollmentEntity } from '@modules/course/enrollment.entity';
import { EnrollmentService } from '@modules/course/enrollment.service';
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
import { CreateEnrollmentUsecase } from '@usecases/course/create-enrollment.usecase';
import { currentSession } from '../decorators/current-user.decorator';
import { Roles } from '../decorators/roles.decorator';
import type { ListResponse } from '../dto/detail.dto';
import { toSearchParams } from '../dto/list-query.dto';
import { toEnrollmentView, type EnrollmentView } from './course.presenter';
import { CreateEnrollmentDto, EnrollmentQueryDto, UpdateEnrollmentDto } from './dto/course.dto';

/**
 * 报名：响应附带该学员在报名班级的出勤天数
 */
@ApiTags('enrollments')
@ApiBearerAuth()
@Controller('enrollments')
export class EnrollmentsController {
  constructor(
    private readonly enrollmentService: EnrollmentService,
    private readonly attendanceService: AttendanceService,
    private readonly createEnrollmentUsecase: CreateEnrollmentUsecase,
  ) {}

  @Get()
  async list(@Query() query: EnrollmentQueryDto): Promise<ListResponse<EnrollmentView>> {
    const page = await this.enrollmentService.search(
      toSearchParams(query, {
        status: query.status,
        batchId: query.batch,
        studentId: query.student,
      }),
    );
    const items = await Promise.all(page.items.map((enrollment) => this.view(enrollment)));
    return { items, total: page.total, page: page.page, pageSize: page.pageSize };
  }

  @Get(':id')
  async get(@Param('id', ParseIntPipe) id: number): Promise<EnrollmentView> {
    return this.view(await this.enrollmentService.getOrThrow(id));
  }

  @Roles(AccessRole.STAFF)
  @Post()
  async create(
    @currentSession() session: UsecaseSession,
    @Body() body: CreateEnrollmentDto,
  ): Promise<EnrollmentView> {
    const enrollment = await this.createEnrollmentUsecase.execute(session, body);
    return this.view(await this.enrollmentService.getOrThrow(enrollment.id));
  }

  @Roles(AccessRole.STAFF)
  @Patch(':id')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() body: UpdateEnrollmentDto,
  ): Promise<EnrollmentView> {
    return this.view(await this.enrollmentService.update(id, body));
  }

  @Roles(AccessRole.STAFF)
  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseIntPipe) id: number): Promise<void> {
    await this.enrollmentService.remove(id);
  }

  private async view(enrollment: EnrollmentEntity): Promise<EnrollmentView> {
    const presentDays = await this.attendanceService.presentDaysFor(
      enrollment.studentId,
      enrollment.batchId,
    );
    return toEnrollmentView(enrollment, presentDays);
  }
}
