// src/adapters/api/finance/finance.presenter.ts
import type {
  ExpenseCategory,
  PaymentMode,
  PayrollBreakdown,
  ReminderStatus,
} from '@app-types/models/finance.types';
import { toCents } from '@core/common/numeric/money';
import { displayName, fullName } from '@modules/account/user.entity';
import type { ExpenseEntity } from '@modules/finance/expense.entity';
import type { FeesReceiptEntity } from '@modules/finance/fees-receipt.entity';
import type { PayrollEntity } from '@modules/finance/payroll.entity';
import type { ReminderEntity } from '@modules/finance/reminder.entity';
import type { StockItemEntity } from '@modules/finance/stock-item.entity';
import type { StockTransactionEntity } from '@modules/finance/stock-transaction.entity';

export interface ReceiptView {
  readonly id: number;
  readonly receiptNo: string;
  readonly studentId: number;
  readonly studentName: string | null;
  readonly courseId: number | null;
  readonly courseTitle: string | null;
  readonly batchId: number | null;
  readonly batchCode: string | null;
  readonly amount: string;
  readonly mode: PaymentMode;
  readonly txnId: string;
  readonly date: string;
  readonly postedById: number | null;
  readonly postedBy: string | null;
  readonly locked: boolean;
}

export function toReceiptView(receipt: FeesReceiptEntity): ReceiptView {
  const user = receipt.student?.user;
  return {
    id: receipt.id,
    receiptNo: receipt.receiptNo,
    studentId: receipt.studentId,
    studentName: user ? fullName(user) : null,
    courseId: receipt.courseId,
    courseTitle: receipt.course?.title ?? null,
    batchId: receipt.batchId,
    batchCode: receipt.batch?.code ?? null,
    amount: receipt.amount,
    mode: receipt.mode,
    txnId: receipt.txnId,
    date: receipt.date,
    postedById: receipt.postedById,
    postedBy: receipt.postedBy ? receipt.postedBy.username : null,
    locked: receipt.locked,
  };
}

export interface ExpenseView {
  readonly id: number;
  readonly date: string;
  readonly description: string;
  readonly category: ExpenseCategory;
  readonly amount: string;
  readonly addedById: number | null;
  readonly addedBy: string | null;
}

export function toExpenseView(expense: ExpenseEntity): ExpenseView {
  return {
    id: expense.id,
    date: expense.date,
    description: expense.description,
    category: expense.category,
    amount: expense.amount,
    addedById: expense.addedById,
    addedBy: expense.addedBy ? expense.addedBy.username : null,
  };
}

export interface PayrollView {
  readonly id: number;
  readonly month: string;
  readonly trainerId: number;
  readonly trainerName: string | null;
  readonly earnings: PayrollBreakdown;
  readonly deductions: PayrollBreakdown;
  readonly netPay: string;
  readonly status: string;
  readonly createdAt: Date;
}

export function toPayrollView(payroll: PayrollEntity): PayrollView {
  const user = payroll.trainer?.user;
  return {
    id: payroll.id,
    month: payroll.month,
    trainerId: payroll.trainerId,
    trainerName: user ? displayName(user) : null,
    earnings: payroll.earnings,
    deductions: payroll.deductions,
    netPay: payroll.netPay,
    status: payroll.status,
    createdAt: payroll.createdAt,
  };
}

export interface ReminderView {
  readonly id: number;
  readonly studentId: number;
  readonly studentName: string | null;
  readonly courseId: number | null;
  readonly courseTitle: string | null;
  readonly batchId: number | null;
  readonly message: string;
  readonly sentAt: Date;
  readonly sentById: number | null;
  readonly status: ReminderStatus;
}

export function toReminderView(reminder: ReminderEntity): ReminderView {
  const user = reminder.student?.user;
  return {
    id: reminder.id,
    studentId: reminder.studentId,
    studentName: user ? fullName(user) : null,
    courseId: reminder.courseId,
    courseTitle: reminder.course?.title ?? null,
    batchId: reminder.batchId,
    message: reminder.message,
    sentAt: reminder.sentAt,
    sentById: reminder.sentById,
    status: reminder.status,
  };
}

export interface StockItemView {
  readonly id: number;
  readonly name: string;
  readonly description: string | null;
  readonly unitOfMeasure: string;
  readonly quantityOnHand: string;
  readonly reorderLevel: string;
  readonly needsReorder: boolean;
}

/** 现有量不高于补货阈值即需补货 */
export function toStockItemView(item: StockItemEntity): StockItemView {
  return {
    id: item.id,
    name: item.name,
    description: item.description,
    unitOfMeasure: item.unitOfMeasure,
    quantityOnHand: item.quantityOnHand,
    reorderLevel: item.reorderLevel,
    needsReorder: toCents(item.quantityOnHand) <= toCents(item.reorderLevel),
  };
}

export interface StockTransactionView {
  readonly id: number;
  readonly itemId: number;
  readonly itemName: string | null;
  readonly date: Date;
  readonly quantityChanged: string;
  readonly reason: string;
  readonly userId: number | null;
}

export function toStockTransactionView(transaction: StockTransactionEntity): StockTransactionView {
  return {
    id: transaction.id,
    itemId: transaction.itemId,
    itemName: transaction.item?.name ?? null,
    date: transaction.date,
    quantityChanged: transaction.quantityChanged,
    reason: transaction.reason,
    userId: transaction.userId,
  };
}
