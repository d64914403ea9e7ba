// src/usecases/attendance/attendance-recorded.handler.spec.ts
import { EnrollmentStatus } from '@app-types/models/course.types';
import { buildEnvelope } from '@core/common/integration-events/events.types';
import { AttendanceService } from '@modules/attendance/attendance.service';
import { BatchService } from '@modules/course/batch.service';
import { EnrollmentService } from '@modules/course/enrollment.service';
import { Test } from '@nestjs/testing';
import { PinoLogger } from 'nestjs-pino';
import { DataSource } from 'typeorm';
import { AttendanceRecordedHandler } from './attendance-recorded.handler';

describe('AttendanceRecordedHandler', () => {
  const manager = { tag: 'tx' };
  const dataSource = { transaction: jest.fn() };
  const attendanceService = { countPresentDays: jest.fn() };
  const batchService = { findById: jest.fn() };
  const enrollmentService = { findActiveInBatch: jest.fn(), save: jest.fn() };
  const logger = { setContext: jest.fn(), info: jest.fn(), warn: jest.fn() };
  let handler: AttendanceRecordedHandler;

  const envelope = buildEnvelope({
    type: 'AttendanceRecorded',
    aggregateType: 'Attendance',
    aggregateId: 50,
    payload: { attendanceId: 50, batchId: 4, studentIds: [1, 2] },
  });

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        AttendanceRecordedHandler,
        { provide: DataSource, useValue: dataSource },
        { provide: AttendanceService, useValue: attendanceService },
        { provide: BatchService, useValue: batchService },
        { provide: EnrollmentService, useValue: enrollmentService },
        { provide: PinoLogger, useValue: logger },
      ],
    }).compile();
    handler = moduleRef.get(AttendanceRecordedHandler);
    dataSource.transaction.mockImplementation((work: (m: typeof manager) => Promise<unknown>) =>
      work(manager),
    );
  });

  it('课程未设置出勤要求时不结课', async () => {
    batchService.findById.mockResolvedValue({ id: 4, course: { requiredAttendanceDays: 0 } });

    await handler.handle({ envelope });

    expect(dataSource.transaction).not.toHaveBeenCalled();
  });

  it('出勤天数达标的在读报名改为已结课', async () => {
    batchService.findById.mockResolvedValue({ id: 4, course: { requiredAttendanceDays: 10 } });
    const first = { id: 11, studentId: 1, status: EnrollmentStatus.ACTIVE };
    const second = { id: 12, studentId: 2, status: EnrollmentStatus.ACTIVE };
    enrollmentService.findActiveInBatch.mockResolvedValue([first, second]);
    attendanceService.countPresentDays.mockResolvedValue(
      new Map([
        [1, 10],
        [2, 9],
      ]),
    );

    await handler.handle({ envelope });

    expect(enrollmentService.findActiveInBatch).toHaveBeenCalledWith(4, [1, 2], manager);
    expect(enrollmentService.save).toHaveBeenCalledTimes(1);
    expect(enrollmentService.save).toHaveBeenCalledWith(
      { id: 11, studentId: 1, status: EnrollmentStatus.COMPLETED },
      manager,
    );
    expect(second.status).toBe(EnrollmentStatus.ACTIVE);
  });
});
