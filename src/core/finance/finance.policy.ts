// src/core/finance/finance.policy.ts
import { differenceInMilliseconds } from 'date-fns';
import { MoneyInput, fromCents, sumCents, toCents } from '@core/common/numeric/money';

/** 工资月份格式 YYYY-MM */
export const MONTH_PATTERN = /^\d{4}-(0[1-9]|1[0-2])$/;

/** 同一学员同一课程两次提醒之间的最小间隔 */
export const REMINDER_INTERVAL_DAYS = 7;

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * 生成收据编号：RCP-{(最后 id + 1) 补齐 6 位}
 */
export function buildReceiptNo(lastId: number): string {
  return `RCP-${String(lastId + 1).padStart(6, '0')}`;
}

/**
 * 欠费（分）：课程总费用 - 已缴合计，可能为负
 */
export function outstandingCents(totalFees: MoneyInput, paid: ReadonlyArray<MoneyInput>): number {
  return toCents(totalFees) - sumCents(paid);
}

/** 单行欠费不低于 0（分） */
export function clampDue(cents: number): number {
  return Math.max(cents, 0);
}

/**
 * 是否需要新建提醒
 * - 仍有欠费
 * - 从未提醒过，或距上次提醒已满 7 个整天
 */
export function shouldCreateReminder(input: {
  readonly dueCents: number;
  readonly lastReminderAt: Date | null;
  readonly now: Date;
}): boolean {
  if (input.dueCents <= 0) return false;
  if (!input.lastReminderAt) return true;
  const elapsedDays = Math.floor(differenceInMilliseconds(input.now, input.lastReminderAt) / DAY_MS);
  return elapsedDays >= REMINDER_INTERVAL_DAYS;
}

/** 两位小数金额文本，例如 1500 → '1500.00' */
export function formatAmount(cents: number): string {
  return fromCents(cents).toFixed(2);
}

/** 缴费后生成的提醒内容 */
export function receiptReminderMessage(firstName: string, courseTitle: string, dueCents: number): string {
  return `Dear ${firstName}, your outstanding fee for ${courseTitle} is ₹${formatAmount(dueCents)}. Please pay soon.`;
}

/** 每日欠费检查生成的提醒内容 */
export function overdueReminderMessage(courseTitle: string, dueCents: number): string {
  return `Outstanding fee ₹${formatAmount(dueCents)} for ${courseTitle}. Please pay soon.`;
}

/**
 * 实发工资不得为负
 */
export function isNetPayValid(netPay: MoneyInput): boolean {
  return toCents(netPay) >= 0;
}

/** 库存是否需要补货：现有量 ≤ 补货阈值 */
export function needsReorder(quantityOnHand: MoneyInput, reorderLevel: MoneyInput): boolean {
  return toCents(quantityOnHand) <= toCents(reorderLevel);
}
