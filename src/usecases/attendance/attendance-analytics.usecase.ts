// src/usecases/attendance/attendance-analytics.usecase.ts
import { type UsecaseSession, isStaffSession } from '@app-types/auth/session.types';
import { AttendanceStatus } from '@app-types/models/attendance.types';
import {
  attendancePercentage,
  buildTimeline,
  summarizeStatuses,
  toStatusCounts,
  type StatusCounts,
  type TimelinePoint,
} from '@core/attendance/attendance.policy';
import { DomainError, PERMISSION_ERROR } from '@core/common/errors/domain-error';
import { fullName } from '@modules/account/user.entity';
import { AttendanceService } from '@modules/attendance/attendance.service';
import { BatchService } from '@modules/course/batch.service';
import { EnrollmentService } from '@modules/course/enrollment.service';
import { StudentService } from '@modules/student/student.service';
import { Injectable } from '@nestjs/common';

export const ATTENDANCE_FORBIDDEN_MESSAGE =
  'You do not have permission to view this attendance data.';

export interface BatchStudentSummary extends StatusCounts {
  readonly studentId: number;
  readonly firstName: string;
  readonly lastName: string;
  readonly regNo: string;
  readonly attendancePercentage: number;
}

export interface BatchAttendanceSummary {
  readonly batchCode: string;
  readonly courseTitle: string;
  readonly trainerName: string | null;
  readonly totalAttendanceDaysTaken: number;
  readonly students: BatchStudentSummary[];
}

export interface StudentBatchSummary extends StatusCounts {
  readonly batchId: number;
  readonly batchCode: string;
  readonly courseTitle: string;
  readonly totalDays: number;
  readonly attendancePercentage: number;
}

export interface StudentAttendanceSummary {
  readonly studentName: string;
  readonly regNo: string;
  readonly batches: StudentBatchSummary[];
}

export interface BatchTimeline {
  readonly batchCode: string;
  readonly courseTitle: string;
  readonly timeline: TimelinePoint[];
}

export interface AttendanceHistoryItem {
  readonly date: string;
  readonly batchCode: string;
  readonly courseTitle: string;
  readonly status: AttendanceStatus;
}

/**
 * 考勤统计（只读）
 */
@Injectable()
export class AttendanceAnalyticsUsecase {
  constructor(
    private readonly attendanceService: AttendanceService,
    private readonly batchService: BatchService,
    private readonly enrollmentService: EnrollmentService,
    private readonly studentService: StudentService,
  ) {}

  /**
   * 班级汇总：以报名学员为准，出勤率分母为班级已记录的考勤天数
   */
  async batchSummary(batchId: number): Promise<BatchAttendanceSummary> {
    const batch = await this.batchService.getOrThrow(batchId);
    const [records, enrollments] = await Promise.all([
      this.attendanceService.findByBatchWithEntries(batchId),
      this.enrollmentService.findByBatch(batchId),
    ]);

    const statusesByStudent = new Map<number, AttendanceStatus[]>();
    for (const record of records) {
      for (const entry of record.entries ?? []) {
        const list = statusesByStudent.get(entry.studentId) ?? [];
        list.push(entry.status);
        statusesByStudent.set(entry.studentId, list);
      }
    }

    const totalDays = records.length;
    const students = enrollments
      .map((enrollment): BatchStudentSummary => {
        const counts = toStatusCounts(
          summarizeStatuses(statusesByStudent.get(enrollment.studentId) ?? []),
        );
        return {
          studentId: enrollment.studentId,
          firstName: enrollment.student?.user?.firstName ?? '',
          lastName: enrollment.student?.user?.lastName ?? '',
          regNo: enrollment.student?.regNo ?? '',
          ...counts,
          attendancePercentage: attendancePercentage(counts.presents, totalDays),
        };
      })
      .sort((a, b) => a.firstName.localeCompare(b.firstName) || a.studentId - b.studentId);

    return {
      batchCode: batch.code,
      courseTitle: batch.course?.title ?? '',
      trainerName: batch.trainer?.user ? fullName(batch.trainer.user) : null,
      totalAttendanceDaysTaken: totalDays,
      students,
    };
  }

  /**
   * 学员按班级汇总：员工或学员本人可查看
   * totalDays 为该学员被记录的天数
   */
  async studentSummary(
    session: UsecaseSession,
    studentId: number,
  ): Promise<StudentAttendanceSummary> {
    if (!isStaffSession(session)) {
      const own = await this.studentService.findByUserId(session.accountId);
      if (own?.id !== studentId) {
        throw new DomainError(PERMISSION_ERROR.ACCESS_DENIED, ATTENDANCE_FORBIDDEN_MESSAGE, {
          studentId,
        });
      }
    }
    const student = await this.studentService.getOrThrow(studentId);
    const entries = await this.attendanceService.findEntriesByStudent(studentId);

    const groups = new Map<
      number,
      { batchCode: string; courseTitle: string; statuses: AttendanceStatus[] }
    >();
    for (const entry of entries) {
      const batch = entry.attendance?.batch;
      if (!batch) continue;
      const group = groups.get(batch.id) ?? {
        batchCode: batch.code,
        courseTitle: batch.course?.title ?? '',
        statuses: [],
      };
      group.statuses.push(entry.status);
      groups.set(batch.id, group);
    }

    const batches = [...groups.entries()]
      .map(([batchId, group]): StudentBatchSummary => {
        const counts = toStatusCounts(summarizeStatuses(group.statuses));
        const totalDays = group.statuses.length;
        return {
          batchId,
          batchCode: group.batchCode,
          courseTitle: group.courseTitle,
          ...counts,
          totalDays,
          attendancePercentage: attendancePercentage(counts.presents, totalDays),
        };
      })
      .sort((a, b) => b.totalDays - a.totalDays || a.batchId - b.batchId);

    return {
      studentName: student.user ? fullName(student.user) : '',
      regNo: student.regNo,
      batches,
    };
  }

  async batchTimeline(batchId: number): Promise<BatchTimeline> {
    const batch = await this.batchService.getOrThrow(batchId);
    const records = await this.attendanceService.findByBatchWithEntries(batchId);
    return {
      batchCode: batch.code,
      courseTitle: batch.course?.title ?? '',
      timeline: buildTimeline(
        records.map((record) => ({
          date: record.date,
          statuses: (record.entries ?? []).map((entry) => entry.status),
        })),
      ),
    };
  }

  /** 当前学员的考勤明细，日期倒序 */
  async myHistory(session: UsecaseSession): Promise<AttendanceHistoryItem[]> {
    const student = await this.studentService.getByUserIdOrThrow(session.accountId);
    const entries = await this.attendanceService.findEntriesByStudent(student.id);
    return entries.map((entry) => ({
      date: entry.attendance?.date ?? '',
      batchCode: entry.attendance?.batch?.code ?? '',
      courseTitle: entry.attendance?.batch?.course?.title ?? '',
      status: entry.status,
    }));
  }
}
