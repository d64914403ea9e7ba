// src/usecases/attendance/record-attendance.usecase.ts
import { type UsecaseSession } from '@app-types/auth/session.types';
import { AttendanceStatus, isAttendanceStatus } from '@app-types/models/attendance.types';
import {
  findDuplicateIds,
  findInvalidStatus,
  INVALID_STATUS_MESSAGE,
} from '@core/attendance/attendance.policy';
import { ATTENDANCE_ERROR, DomainError, STUDENT_ERROR } from '@core/common/errors/domain-error';
import { buildEnvelope } from '@core/common/integration-events/events.types';
import type { IOutboxWriterPort } from '@core/common/integration-events/outbox.port';
import { AttendanceEntity } from '@modules/attendance/attendance.entity';
import { AttendanceData, AttendanceService } from '@modules/attendance/attendance.service';
import { OUTBOX_WRITER } from '@modules/common/integration-events/events.tokens';
import { BatchService } from '@modules/course/batch.service';
import { StudentService } from '@modules/student/student.service';
import { Inject, Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';
import { DataSource, EntityManager } from 'typeorm';

export const DUPLICATE_ENTRIES_MESSAGE = 'Duplicate student entries detected.';

/** 提交的明细，状态码在用例内校验 */
export interface AttendanceEntryInput {
  readonly studentId: number;
  readonly status: string;
}

export interface CreateAttendanceInput extends AttendanceData {
  readonly entries?: ReadonlyArray<AttendanceEntryInput>;
}

export interface UpdateAttendanceInput extends Partial<AttendanceData> {
  readonly entries?: ReadonlyArray<AttendanceEntryInput>;
}

/**
 * 考勤录入与修改
 * 提交后发布 AttendanceRecorded，由处理器判定自动结课
 */
@Injectable()
export class RecordAttendanceUsecase {
  constructor(
    private readonly dataSource: DataSource,
    private readonly attendanceService: AttendanceService,
    private readonly batchService: BatchService,
    private readonly studentService: StudentService,
    @Inject(OUTBOX_WRITER)
    private readonly outboxWriter: IOutboxWriterPort,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(RecordAttendanceUsecase.name);
  }

  async create(session: UsecaseSession, input: CreateAttendanceInput): Promise<AttendanceEntity> {
    const entries = await this.validateEntries(input.entries ?? []);

    const saved = await this.dataSource.transaction(async (manager) => {
      await this.batchService.getOrThrow(input.batchId, manager);
      const attendance = await this.attendanceService.createRecord(
        {
          batchId: input.batchId,
          date: input.date,
          remarks: input.remarks,
          takenById: session.accountId,
        },
        manager,
      );
      await this.attendanceService.replaceEntries(attendance.id, entries, manager);
      await this.publish(attendance, entries, manager);
      return attendance;
    });

    this.logger.info(
      { attendanceId: saved.id, batchId: saved.batchId, entries: entries.length },
      '考勤已录入',
    );
    return this.attendanceService.getOrThrow(saved.id);
  }

  /** entries 提供时整体替换明细 */
  async update(id: number, input: UpdateAttendanceInput): Promise<AttendanceEntity> {
    const entries = input.entries ? await this.validateEntries(input.entries) : null;

    await this.dataSource.transaction(async (manager) => {
      const current = await this.attendanceService.getOrThrow(id, manager);
      if (input.batchId !== undefined) await this.batchService.getOrThrow(input.batchId, manager);
      // updateRecord 会清空已加载的明细，先取出
      const effective = entries ?? (current.entries ?? []).map((e) => ({ studentId: e.studentId }));
      const saved = await this.attendanceService.updateRecord(
        current,
        { batchId: input.batchId, date: input.date, remarks: input.remarks },
        manager,
      );
      if (entries) await this.attendanceService.replaceEntries(saved.id, entries, manager);
      await this.publish(saved, effective, manager);
    });

    return this.attendanceService.getOrThrow(id);
  }

  private async validateEntries(
    entries: ReadonlyArray<AttendanceEntryInput>,
  ): Promise<Array<{ studentId: number; status: AttendanceStatus }>> {
    const invalid = findInvalidStatus(entries.map((e) => e.status));
    if (invalid !== null) {
      throw new DomainError(ATTENDANCE_ERROR.INVALID_STATUS, INVALID_STATUS_MESSAGE, {
        status: invalid,
      });
    }
    const ids = entries.map((e) => e.studentId);
    const duplicates = findDuplicateIds(ids);
    if (duplicates.length > 0) {
      throw new DomainError(
        ATTENDANCE_ERROR.DUPLICATE_STUDENT_ENTRIES,
        DUPLICATE_ENTRIES_MESSAGE,
        { studentIds: duplicates },
      );
    }

    const found = await this.studentService.findManyByIds(ids);
    const known = new Set(found.map((s) => s.id));
    const missing = ids.filter((studentId) => !known.has(studentId));
    if (missing.length > 0) {
      throw new DomainError(STUDENT_ERROR.STUDENT_NOT_FOUND, 'Student not found.', {
        studentIds: missing,
      });
    }

    const result: Array<{ studentId: number; status: AttendanceStatus }> = [];
    for (const entry of entries) {
      if (isAttendanceStatus(entry.status)) {
        result.push({ studentId: entry.studentId, status: entry.status });
      }
    }
    return result;
  }

  private async publish(
    attendance: AttendanceEntity,
    entries: ReadonlyArray<{ readonly studentId: number }>,
    manager: EntityManager,
  ): Promise<void> {
    await this.outboxWriter.enqueue({
      envelope: buildEnvelope({
        type: 'AttendanceRecorded',
        aggregateType: 'Attendance',
        aggregateId: attendance.id,
        payload: {
          attendanceId: attendance.id,
          batchId: attendance.batchId,
          studentIds: entries.map((e) => e.studentId),
        },
      }),
      tx: { kind: 'tx', opaque: manager },
    });
  }
}
