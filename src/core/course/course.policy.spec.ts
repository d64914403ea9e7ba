// src/core/course/course.policy.spec.ts
import { isBatchFull, isDateRangeValid, meetsAttendanceRequirement } from './course.policy';

describe('course.policy', () => {
  it('结束日期可以等于开始日期', () => {
    expect(isDateRangeValid('2024-01-10', '2024-01-10')).toBe(true);
    expect(isDateRangeValid('2024-01-10', '2024-03-01')).toBe(true);
    expect(isDateRangeValid('2024-01-10', '2024-01-09')).toBe(false);
  });

  it('报名数达到容量即满员', () => {
    expect(isBatchFull(9, 10)).toBe(false);
    expect(isBatchFull(10, 10)).toBe(true);
  });

  it('所需出勤天数为 0 时不结课', () => {
    expect(meetsAttendanceRequirement(30, 0)).toBe(false);
    expect(meetsAttendanceRequirement(19, 20)).toBe(false);
    expect(meetsAttendanceRequirement(20, 20)).toBe(true);
  });
});
