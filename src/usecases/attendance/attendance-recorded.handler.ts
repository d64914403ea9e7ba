// src/usecases/attendance/attendance-recorded.handler.ts
import { EnrollmentStatus } from '@app-types/models/course.types';
import { meetsAttendanceRequirement } from '@core/course/course.policy';
import {
  type IntegrationEventEnvelope,
  readPayloadId,
  readPayloadIds,
} from '@core/common/integration-events/events.types';
import { AttendanceService } from '@modules/attendance/attendance.service';
import type { IntegrationEventHandler } from '@modules/common/integration-events/outbox.dispatcher';
import { BatchService } from '@modules/course/batch.service';
import { EnrollmentService } from '@modules/course/enrollment.service';
import { Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';
import { DataSource } from 'typeorm';

/**
 * AttendanceRecorded 事件处理器（自动结课）
 * 每次都按数据库现状重新计算出勤天数，重复投递不影响结果
 */
@Injectable()
export class AttendanceRecordedHandler implements IntegrationEventHandler {
  readonly type = 'AttendanceRecorded' as const;

  constructor(
    private readonly dataSource: DataSource,
    private readonly attendanceService: AttendanceService,
    private readonly batchService: BatchService,
    private readonly enrollmentService: EnrollmentService,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(AttendanceRecordedHandler.name);
  }

  async handle({ envelope }: { readonly envelope: IntegrationEventEnvelope }): Promise<void> {
    const batchId = readPayloadId(envelope.payload, 'batchId');
    const studentIds = readPayloadIds(envelope.payload, 'studentIds');
    if (!batchId) {
      this.logger.warn({ type: envelope.type, payload: envelope.payload }, '事件缺少 batchId');
      return;
    }
    if (studentIds.length === 0) return;

    const batch = await this.batchService.findById(batchId);
    const required = batch?.course?.requiredAttendanceDays ?? 0;
    if (!batch || required <= 0) return;

    const completed = await this.dataSource.transaction(async (manager) => {
      const enrollments = await this.enrollmentService.findActiveInBatch(batchId, studentIds, manager);
      if (enrollments.length === 0) return [];
      const presentDays = await this.attendanceService.countPresentDays(
        batchId,
        enrollments.map((e) => e.studentId),
        manager,
      );
      const flipped: number[] = [];
      for (const enrollment of enrollments) {
        if (!meetsAttendanceRequirement(presentDays.get(enrollment.studentId) ?? 0, required)) {
          continue;
        }
        enrollment.status = EnrollmentStatus.COMPLETED;
        await this.enrollmentService.save(enrollment, manager);
        flipped.push(enrollment.id);
      }
      return flipped;
    });

    if (completed.length > 0) {
      this.logger.info({ batchId, enrollmentIds: completed, required }, '报名已自动结课');
    }
  }
}
