// src/core/attendance/attendance.policy.ts
import { AttendanceStatus, isAttendanceStatus } from '@app-types/models/attendance.types';
import { percentage } from '@core/common/numeric/money';

export type AttendanceSummary = Record<AttendanceStatus, number>;

export interface StatusCounts {
  readonly presents: number;
  readonly absents: number;
  readonly leaves: number;
}

/**
 * 统计各状态数量，三种状态总是出现在结果中
 */
export function summarizeStatuses(statuses: ReadonlyArray<AttendanceStatus>): AttendanceSummary {
  const summary: AttendanceSummary = { P: 0, A: 0, L: 0 };
  for (const status of statuses) summary[status] += 1;
  return summary;
}

export function toStatusCounts(summary: AttendanceSummary): StatusCounts {
  return { presents: summary.P, absents: summary.A, leaves: summary.L };
}

/**
 * 找出重复出现的学员 id（按首次重复的顺序）
 */
export function findDuplicateIds(ids: ReadonlyArray<number>): number[] {
  const seen = new Set<number>();
  const dupes = new Set<number>();
  for (const id of ids) {
    if (seen.has(id)) dupes.add(id);
    seen.add(id);
  }
  return [...dupes];
}

/** 返回第一个非法状态码，全部合法时返回 null */
export function findInvalidStatus(statuses: ReadonlyArray<string>): string | null {
  return statuses.find((s) => !isAttendanceStatus(s)) ?? null;
}

/** 出勤率：出勤次数 / 总天数 * 100，保留两位；无考勤日时为 0 */
export function attendancePercentage(presents: number, totalDays: number): number {
  return percentage(presents, totalDays);
}

export interface TimelinePoint {
  readonly date: string;
  readonly presentPercentage: number;
  readonly presentCount: number;
  readonly totalMarked: number;
}

/**
 * 构建班级出勤时间线，按日期升序
 */
export function buildTimeline(
  records: ReadonlyArray<{ readonly date: string; readonly statuses: ReadonlyArray<AttendanceStatus> }>,
): TimelinePoint[] {
  return [...records]
    .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0))
    .map((record) => {
      const presentCount = record.statuses.filter((s) => s === AttendanceStatus.PRESENT).length;
      const totalMarked = record.statuses.length;
      return {
        date: record.date,
        presentPercentage: percentage(presentCount, totalMarked),
        presentCount,
        totalMarked,
      };
    });
}

export const INVALID_STATUS_MESSAGE = 'Invalid status code. Must be P, A, or L.';
