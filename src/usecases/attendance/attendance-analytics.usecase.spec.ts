// src/usecases/attendance/attendance-analytics.usecase.spec.ts
import { type UsecaseSession } from '@app-types/auth/session.types';
import { AttendanceStatus } from '@app-types/models/attendance.types';
import { PERMISSION_ERROR } from '@core/common/errors/domain-error';
import { AttendanceService } from '@modules/attendance/attendance.service';
import { BatchService } from '@modules/course/batch.service';
import { EnrollmentService } from '@modules/course/enrollment.service';
import { StudentService } from '@modules/student/student.service';
import { Test } from '@nestjs/testing';
import {
  ATTENDANCE_FORBIDDEN_MESSAGE,
  AttendanceAnalyticsUsecase,
} from './attendance-analytics.usecase';

const { PRESENT: P, ABSENT: A, LEAVE: L } = AttendanceStatus;

describe('AttendanceAnalyticsUsecase', () => {
  const attendanceService = { findByBatchWithEntries: jest.fn(), findEntriesByStudent: jest.fn() };
  const batchService = { getOrThrow: jest.fn() };
  const enrollmentService = { findByBatch: jest.fn() };
  const studentService = { findByUserId: jest.fn(), getOrThrow: jest.fn() };
  let usecase: AttendanceAnalyticsUsecase;

  const staff: UsecaseSession = { accountId: 1, username: 'office', roles: ['STAFF'] };
  const studentSession: UsecaseSession = { accountId: 30, username: 'kavya', roles: ['STUDENT'] };

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        AttendanceAnalyticsUsecase,
        { provide: AttendanceService, useValue: attendanceService },
        { provide: BatchService, useValue: batchService },
        { provide: EnrollmentService, useValue: enrollmentService },
        { provide: StudentService, useValue: studentService },
      ],
    }).compile();
    usecase = moduleRef.get(AttendanceAnalyticsUsecase);
  });

  it('班级汇总以报名学员为准并按名字排序', async () => {
    batchService.getOrThrow.mockResolvedValue({
      id: 4,
      code: 'BL-01',
      course: { title: 'Blouse Cutting' },
      trainer: { user: { firstName: 'Lata', lastName: 'Rao' } },
    });
    attendanceService.findByBatchWithEntries.mockResolvedValue([
      { date: '2024-03-01', entries: [{ studentId: 1, status: P }, { studentId: 2, status: A }] },
      { date: '2024-03-02', entries: [{ studentId: 1, status: P }, { studentId: 2, status: P }] },
      { date: '2024-03-03', entries: [{ studentId: 1, status: L }] },
    ]);
    enrollmentService.findByBatch.mockResolvedValue([
      { studentId: 1, student: { regNo: 'STU2024-001', user: { firstName: 'Zoya', lastName: 'K' } } },
      { studentId: 2, student: { regNo: 'STU2024-002', user: { firstName: 'Anu', lastName: 'M' } } },
      { studentId: 3, student: { regNo: 'STU2024-003', user: { firstName: 'Bina', lastName: 'S' } } },
    ]);

    const result = await usecase.batchSummary(4);

    expect(result).toEqual({
      batchCode: 'BL-01',
      courseTitle: 'Blouse Cutting',
      trainerName: 'Lata Rao',
      totalAttendanceDaysTaken: 3,
      students: [
        {
          studentId: 2,
          firstName: 'Anu',
          lastName: 'M',
          regNo: 'STU2024-002',
          presents: 1,
          absents: 1,
          leaves: 0,
          attendancePercentage: 33.33,
        },
        {
          studentId: 3,
          firstName: 'Bina',
          lastName: 'S',
          regNo: 'STU2024-003',
          presents: 0,
          absents: 0,
          leaves: 0,
          attendancePercentage: 0,
        },
        {
          studentId: 1,
          firstName: 'Zoya',
          lastName: 'K',
          regNo: 'STU2024-001',
          presents: 2,
          absents: 0,
          leaves: 1,
          attendancePercentage: 66.67,
        },
      ],
    });
  });

  it('学员只能查看自己的考勤统计', async () => {
    studentService.findByUserId.mockResolvedValue({ id: 8 });

    await expect(usecase.studentSummary(studentSession, 9)).rejects.toMatchObject({
      code: PERMISSION_ERROR.ACCESS_DENIED,
      message: ATTENDANCE_FORBIDDEN_MESSAGE,
    });
    expect(studentService.getOrThrow).not.toHaveBeenCalled();
  });

  it('学员统计按班级分组并按记录天数倒序', async () => {
    studentService.getOrThrow.mockResolvedValue({
      id: 9,
      regNo: 'STU2024-009',
      user: { firstName: 'Kavya', lastName: 'Iyer' },
    });
    const b1 = { id: 1, code: 'B1', course: { title: 'Basics' } };
    const b2 = { id: 2, code: 'B2', course: { title: 'Advanced' } };
    attendanceService.findEntriesByStudent.mockResolvedValue([
      { status: P, attendance: { date: '2024-05-03', batch: b2 } },
      { status: A, attendance: { date: '2024-05-02', batch: b2 } },
      { status: P, attendance: { date: '2024-01-02', batch: b1 } },
    ]);

    const result = await usecase.studentSummary(staff, 9);

    expect(result).toEqual({
      studentName: 'Kavya Iyer',
      regNo: 'STU2024-009',
      batches: [
        {
          batchId: 2,
          batchCode: 'B2',
          courseTitle: 'Advanced',
          presents: 1,
          absents: 1,
          leaves: 0,
          totalDays: 2,
          attendancePercentage: 50,
        },
        {
          batchId: 1,
          batchCode: 'B1',
          courseTitle: 'Basics',
          presents: 1,
          absents: 0,
          leaves: 0,
          totalDays: 1,
          attendancePercentage: 100,
        },
      ],
    });
  });

  it('时间线按日期升序', async () => {
    batchService.getOrThrow.mockResolvedValue({ id: 4, code: 'BL-01', course: { title: 'Blouse' } });
    attendanceService.findByBatchWithEntries.mockResolvedValue([
      { date: '2024-03-02', entries: [{ studentId: 1, status: P }, { studentId: 2, status: A }] },
      { date: '2024-03-01', entries: [] },
    ]);

    const result = await usecase.batchTimeline(4);

    expect(result.timeline).toEqual([
      { date: '2024-03-01', presentPercentage: 0, presentCount: 0, totalMarked: 0 },
      { date: '2024-03-02', presentPercentage: 50, presentCount: 1, totalMarked: 2 },
    ]);
  });
});
