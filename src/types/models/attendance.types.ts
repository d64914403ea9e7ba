// src/types/models/attendance.types.ts

/** 出勤状态：P=出勤，A=缺勤，L=请假 */
export enum AttendanceStatus {
  PRESENT = 'P',
  ABSENT = 'A',
  LEAVE = 'L',
}

export const ATTENDANCE_STATUS_VALUES: ReadonlyArray<string> = Object.values(AttendanceStatus);

export function isAttendanceStatus(value: unknown): value is AttendanceStatus {
  return typeof value === 'string' && ATTENDANCE_STATUS_VALUES.includes(value);
}
