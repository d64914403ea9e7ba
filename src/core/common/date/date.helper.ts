// src/core/common/date/date.helper.ts
import { addDays, format, isValid, parseISO } from 'date-fns';

/** DATE 列统一使用的文本格式 */
export const DATE_FORMAT = 'yyyy-MM-dd';

/** 本地日期文本，如 2024-06-01 */
export function toDateString(date: Date): string {
  return format(date, DATE_FORMAT);
}

export function todayString(now: Date = new Date()): string {
  return toDateString(now);
}

export function tomorrowString(now: Date = new Date()): string {
  return toDateString(addDays(now, 1));
}

/** 是否为合法的 YYYY-MM-DD 文本 */
export function isDateString(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(value) && isValid(parseISO(value));
}

/** YYYY-MM-DD 文本可直接按字典序比较 */
export function compareDateStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
