// src/core/student/student.policy.ts
import { nextSequenceNo } from '@core/common/numeric/sequence';

/** 电话号码允许的字符 */
export const PHONE_PATTERN = /^[0-9+() -]+$/;

export function regNoPrefix(year: number): string {
  return `STU${year}-`;
}

/**
 * 学号：STU{年份}-{序号补齐 3 位}
 * @param lastRegNo 当年已用的最大学号
 */
export function buildRegNo(year: number, lastRegNo: string | null): string {
  return nextSequenceNo(regNoPrefix(year), lastRegNo, 3);
}

/** 入学日期不得晚于今天（均为 YYYY-MM-DD） */
export function isAdmissionDateInFuture(admissionDate: string, today: string): boolean {
  return admissionDate > today;
}
