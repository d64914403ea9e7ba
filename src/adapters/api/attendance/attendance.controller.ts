// src/adapters/api/attendance/attendance.controller.ts
import type { UsecaseSession } from '@app-types/auth/session.types';
import { AccessRole } from '@app-types/models/account.types';
import { AttendanceService } from '@modules/attendance/attendance.service';
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
import {
  AttendanceAnalyticsUsecase,
  type AttendanceHistoryItem,
  type BatchAttendanceSummary,
  type BatchTimeline,
  type StudentAttendanceSummary,
} from '@usecases/attendance/attendance-analytics.usecase';
import { RecordAttendanceUsecase } from '@usecases/attendance/record-attendance.usecase';
import { currentSession } from '../decorators/current-user.decorator';
import { Roles } from '../decorators/roles.decorator';
import { mapPage, type ListResponse } from '../dto/detail.dto';
import { toSearchParams } from '../dto/list-query.dto';
import { toAttendanceView, type AttendanceView } from './attendance.presenter';
import { AttendanceQueryDto, CreateAttendanceDto, UpdateAttendanceDto } from './dto/attendance.dto';

/**
 * 考勤记录与统计
 */
@ApiTags('attendance')
@ApiBearerAuth()
@Controller('attendance')
export class AttendanceController {
  constructor(
    private readonly attendanceService: AttendanceService,
    private readonly recordAttendanceUsecase: RecordAttendanceUsecase,
    private readonly analyticsUsecase: AttendanceAnalyticsUsecase,
  ) {}

  @Get('records')
  async list(@Query() query: AttendanceQueryDto): Promise<ListResponse<AttendanceView>> {
    const page = await this.attendanceService.search(
      toSearchParams(query, { batchId: query.batch, date: query.date, courseId: query.course }),
    );
    return mapPage(page, toAttendanceView);
  }

  @Roles(AccessRole.STAFF)
  @Post('records')
  async create(
    @currentSession() session: UsecaseSession,
    @Body() body: CreateAttendanceDto,
  ): Promise<AttendanceView> {
    return toAttendanceView(await this.recordAttendanceUsecase.create(session, body));
  }

  @Get('records/:id')
  async get(@Param('id', ParseIntPipe) id: number): Promise<AttendanceView> {
    return toAttendanceView(await this.attendanceService.getOrThrow(id));
  }

  @Roles(AccessRole.STAFF)
  @Patch('records/:id')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() body: UpdateAttendanceDto,
  ): Promise<AttendanceView> {
    return toAttendanceView(await this.recordAttendanceUsecase.update(id, body));
  }

  @Roles(AccessRole.STAFF)
  @Delete('records/:id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseIntPipe) id: number): Promise<void> {
    await this.attendanceService.remove(id);
  }

  @Roles(AccessRole.ADMIN)
  @Get('analytics/batch/:id')
  async batchSummary(@Param('id', ParseIntPipe) id: number): Promise<BatchAttendanceSummary> {
    return this.analyticsUsecase.batchSummary(id);
  }

  @Roles(AccessRole.ADMIN)
  @Get('analytics/batch/:id/timeline')
  async batchTimeline(@Param('id', ParseIntPipe) id: number): Promise<BatchTimeline> {
    return this.analyticsUsecase.batchTimeline(id);
  }

  /** 员工或学员本人，权限在用例内判定 */
  @Get('analytics/student/:id')
  async studentSummary(
    @currentSession() session: UsecaseSession,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<StudentAttendanceSummary> {
    return this.analyticsUsecase.studentSummary(session, id);
  }

  @Roles(AccessRole.STUDENT)
  @Get('my-history')
  async myHistory(@currentSession() session: UsecaseSession): Promise<AttendanceHistoryItem[]> {
    return this.analyticsUsecase.myHistory(session);
  }
}
