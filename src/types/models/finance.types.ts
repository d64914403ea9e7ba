// src/types/models/finance.types.ts

/** 缴费方式 */
export enum PaymentMode {
  CASH = 'cash',
  UPI = 'upi',
  BANK = 'bank',
  CARD = 'card',
}

/** 支出类别 */
export enum ExpenseCategory {
  MATERIAL = 'material',
  MAINTENANCE = 'maintenance',
  SALARY = 'salary',
  OTHER = 'other',
}

/** 催缴提醒状态 */
export enum ReminderStatus {
  PENDING = 'pending',
  SENT = 'sent',
  FAILED = 'failed',
}

/** 工资单明细，如 { "basic": 20000, "bonus": 1500 } */
export type PayrollBreakdown = Record<string, number>;

export const DEFAULT_PAYROLL_STATUS = 'Pending';
