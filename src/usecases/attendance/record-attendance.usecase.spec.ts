// src/usecases/attendance/record-attendance.usecase.spec.ts
import { type UsecaseSession } from '@app-types/auth/session.types';
import { INVALID_STATUS_MESSAGE } from '@core/attendance/attendance.policy';
import { ATTENDANCE_ERROR } from '@core/common/errors/domain-error';
import { AttendanceService } from '@modules/attendance/attendance.service';
import { OUTBOX_WRITER } from '@modules/common/integration-events/events.tokens';
import { BatchService } from '@modules/course/batch.service';
import { StudentService } from '@modules/student/student.service';
import { Test } from '@nestjs/testing';
import { PinoLogger } from 'nestjs-pino';
import { DataSource } from 'typeorm';
import { DUPLICATE_ENTRIES_MESSAGE, RecordAttendanceUsecase } from './record-attendance.usecase';

describe('RecordAttendanceUsecase', () => {
  const manager = { tag: 'tx' };
  const dataSource = { transaction: jest.fn() };
  const attendanceService = {
    createRecord: jest.fn(),
    replaceEntries: jest.fn(),
    getOrThrow: jest.fn(),
    updateRecord: jest.fn(),
  };
  const batchService = { getOrThrow: jest.fn() };
  const studentService = { findManyByIds: jest.fn() };
  const outboxWriter = { enqueue: jest.fn() };
  const logger = { setContext: jest.fn(), info: jest.fn() };
  const session: UsecaseSession = { accountId: 6, username: 'trainer', roles: ['STAFF'] };
  let usecase: RecordAttendanceUsecase;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        RecordAttendanceUsecase,
        { provide: DataSource, useValue: dataSource },
        { provide: AttendanceService, useValue: attendanceService },
        { provide: BatchService, useValue: batchService },
        { provide: StudentService, useValue: studentService },
        { provide: OUTBOX_WRITER, useValue: outboxWriter },
        { provide: PinoLogger, useValue: logger },
      ],
    }).compile();
    usecase = moduleRef.get(RecordAttendanceUsecase);
    dataSource.transaction.mockImplementation((work: (m: typeof manager) => Promise<unknown>) =>
      work(manager),
    );
  });

  it('非法状态码被拒绝', async () => {
    await expect(
      usecase.create(session, {
        batchId: 4,
        date: '2024-03-01',
        entries: [{ studentId: 1, status: 'X' }],
      }),
    ).rejects.toMatchObject({ code: ATTENDANCE_ERROR.INVALID_STATUS, message: INVALID_STATUS_MESSAGE });
  });

  it('同一学员重复出现时拒绝', async () => {
    await expect(
      usecase.create(session, {
        batchId: 4,
        date: '2024-03-01',
        entries: [
          { studentId: 1, status: 'P' },
          { studentId: 1, status: 'A' },
        ],
      }),
    ).rejects.toMatchObject({
      code: ATTENDANCE_ERROR.DUPLICATE_STUDENT_ENTRIES,
      message: DUPLICATE_ENTRIES_MESSAGE,
    });
    expect(dataSource.transaction).not.toHaveBeenCalled();
  });

  it('录入考勤并发布 AttendanceRecorded', async () => {
    studentService.findManyByIds.mockResolvedValue([{ id: 1 }, { id: 2 }]);
    batchService.getOrThrow.mockResolvedValue({ id: 4 });
    attendanceService.createRecord.mockResolvedValue({ id: 50, batchId: 4 });
    attendanceService.getOrThrow.mockResolvedValue({ id: 50, batchId: 4, entries: [] });

    await usecase.create(session, {
      batchId: 4,
      date: '2024-03-01',
      remarks: 'Morning',
      entries: [
        { studentId: 1, status: 'P' },
        { studentId: 2, status: 'L' },
      ],
    });

    expect(attendanceService.createRecord).toHaveBeenCalledWith(
      { batchId: 4, date: '2024-03-01', remarks: 'Morning', takenById: 6 },
      manager,
    );
    expect(attendanceService.replaceEntries).toHaveBeenCalledWith(
      50,
      [
        { studentId: 1, status: 'P' },
        { studentId: 2, status: 'L' },
      ],
      manager,
    );
    expect(outboxWriter.enqueue).toHaveBeenCalledTimes(1);
    const [{ envelope, tx }] = outboxWriter.enqueue.mock.calls[0];
    expect(envelope.type).toBe('AttendanceRecorded');
    expect(envelope.payload).toEqual({ attendanceId: 50, batchId: 4, studentIds: [1, 2] });
    expect(tx).toEqual({ kind: 'tx', opaque: manager });
  });
});
