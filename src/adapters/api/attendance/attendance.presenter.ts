// src/adapters/api/attendance/attendance.presenter.ts
import type { AttendanceStatus } from '@app-types/models/attendance.types';
import { summarizeStatuses, type AttendanceSummary } from '@core/attendance/attendance.policy';
import { fullName } from '@modules/account/user.entity';
import type { AttendanceEntity } from '@modules/attendance/attendance.entity';

export interface AttendanceEntryView {
  readonly id: number;
  readonly studentId: number;
  readonly studentName: string;
  readonly status: AttendanceStatus;
}

export interface AttendanceView {
  readonly id: number;
  readonly batchId: number;
  readonly batchCode: string | null;
  readonly date: string;
  readonly takenById: number | null;
  readonly takenBy: string | null;
  readonly remarks: string | null;
  readonly entries: AttendanceEntryView[];
  readonly summary: AttendanceSummary;
}

export function toAttendanceView(attendance: AttendanceEntity): AttendanceView {
  const entries = (attendance.entries ?? []).map((entry) => ({
    id: entry.id,
    studentId: entry.studentId,
    studentName: entry.student?.user ? fullName(entry.student.user) : '',
    status: entry.status,
  }));
  return {
    id: attendance.id,
    batchId: attendance.batchId,
    batchCode: attendance.batch?.code ?? null,
    date: attendance.date,
    takenById: attendance.takenById,
    takenBy: attendance.takenBy?.username ?? null,
    remarks: attendance.remarks,
    entries,
    summary: summarizeStatuses(entries.map((entry) => entry.status)),
  };
}
