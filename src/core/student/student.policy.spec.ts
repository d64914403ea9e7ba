// src/core/student/student.policy.spec.ts
import { PHONE_PATTERN, buildRegNo, isAdmissionDateInFuture, regNoPrefix } from './student.policy';

describe('student.policy', () => {
  it('buildRegNo 在当年最大学号上续号，补齐 3 位', () => {
    expect(regNoPrefix(2024)).toBe('STU2024-');
    expect(buildRegNo(2024, null)).toBe('STU2024-001');
    expect(buildRegNo(2024, 'STU2024-041')).toBe('STU2024-042');
    expect(buildRegNo(2025, 'STU2025-1000')).toBe('STU2025-1001');
  });

  it('入学日期晚于今天视为非法', () => {
    expect(isAdmissionDateInFuture('2024-06-02', '2024-06-01')).toBe(true);
    expect(isAdmissionDateInFuture('2024-06-01', '2024-06-01')).toBe(false);
  });

  it('电话号码格式', () => {
    expect(PHONE_PATTERN.test('+91 (80) 1234-567')).toBe(true);
    expect(PHONE_PATTERN.test('98765x')).toBe(false);
  });
});
