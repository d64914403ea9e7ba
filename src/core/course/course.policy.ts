// src/core/course/course.policy.ts

/**
 * 日期区间校验：结束日期不得早于开始日期（YYYY-MM-DD 字符串比较）
 */
export function isDateRangeValid(startDate: string, endDate: string): boolean {
  return endDate >= startDate;
}

/**
 * 班级是否已满（按全部状态的报名数计）
 */
export function isBatchFull(enrolledCount: number, capacity: number): boolean {
  return enrolledCount >= capacity;
}

/**
 * 是否满足自动结课条件
 * requiredAttendanceDays 为 0 表示该课程不自动结课
 */
export function meetsAttendanceRequirement(presentDays: number, requiredDays: number): boolean {
  return requiredDays > 0 && presentDays >= requiredDays;
}
