// src/adapters/api/finance/dto/ledger.dto.ts
// 支出、工资单、缴费提醒
import { ExpenseCategory, ReminderStatus } from '@app-types/models/finance.types';
import { Type } from 'class-transformer';
import {
  IsDateString,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  MaxLength,
  ValidateIf,
} from 'class-validator';
import { DecimalString } from '../../dto/decimal.dto';
import { ListQueryDto } from '../../dto/list-query.dto';

const DATE_OPTIONS = { strict: true } as const;
const CATEGORY_MESSAGE = 'category must be one of material, maintenance, salary, other.';
const notNull = (_object: object, value: unknown): boolean => value !== null;

export class CreateExpenseDto {
  @IsDateString(DATE_OPTIONS, { message: 'date must be a YYYY-MM-DD date.' })
  date!: string;

  @IsString()
  @IsNotEmpty({ message: 'description may not be blank.' })
  @MaxLength(255, { message: 'description must be at most 255 characters.' })
  description!: string;

  @IsEnum(ExpenseCategory, { message: CATEGORY_MESSAGE })
  category!: ExpenseCategory;

  @DecimalString({ field: 'amount' })
  amount!: string;
}

export class UpdateExpenseDto {
  @IsOptional()
  @IsDateString(DATE_OPTIONS, { message: 'date must be a YYYY-MM-DD date.' })
  date?: string;

  @IsOptional()
  @IsString()
  @MaxLength(255, { message: 'description must be at most 255 characters.' })
  description?: string;

  @IsOptional()
  @IsEnum(ExpenseCategory, { message: CATEGORY_MESSAGE })
  category?: ExpenseCategory;

  @IsOptional()
  @DecimalString({ field: 'amount' })
  amount?: string;
}

export class ExpenseQueryDto extends ListQueryDto {
  @IsOptional()
  @IsEnum(ExpenseCategory, { message: CATEGORY_MESSAGE })
  category?: ExpenseCategory;

  @IsOptional()
  @IsDateString(DATE_OPTIONS, { message: 'date must be a YYYY-MM-DD date.' })
  date?: string;
}

/** 月份格式与净额非负由用例校验 */
export class CreatePayrollDto {
  @IsString({ message: 'month must be a string.' })
  month!: string;

  @IsInt({ message: 'trainerId must be an integer.' })
  trainerId!: number;

  @IsOptional()
  @IsObject({ message: 'earnings must be an object.' })
  earnings?: Record<string, number>;

  @IsOptional()
  @IsObject({ message: 'deductions must be an object.' })
  deductions?: Record<string, number>;

  @DecimalString({ field: 'netPay', signed: true })
  netPay!: string;

  @IsOptional()
  @IsString()
  @MaxLength(20)
  status?: string;
}

export class UpdatePayrollDto {
  @IsOptional()
  @IsString({ message: 'month must be a string.' })
  month?: string;

  @IsOptional()
  @IsInt({ message: 'trainerId must be an integer.' })
  trainerId?: number;

  @IsOptional()
  @IsObject({ message: 'earnings must be an object.' })
  earnings?: Record<string, number>;

  @IsOptional()
  @IsObject({ message: 'deductions must be an object.' })
  deductions?: Record<string, number>;

  @IsOptional()
  @DecimalString({ field: 'netPay', signed: true })
  netPay?: string;

  @IsOptional()
  @IsString()
  @MaxLength(20)
  status?: string;
}

export class PayrollQueryDto extends ListQueryDto {
  @IsOptional()
  @IsString()
  month?: string;

  @IsOptional()
  @IsString()
  status?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'trainer must be an integer.' })
  trainer?: number;
}

export class CreateReminderDto {
  @IsInt({ message: 'studentId must be an integer.' })
  studentId!: number;

  @IsOptional()
  @ValidateIf(notNull)
  @IsInt({ message: 'courseId must be an integer.' })
  courseId?: number | null;

  @IsOptional()
  @ValidateIf(notNull)
  @IsInt({ message: 'batchId must be an integer.' })
  batchId?: number | null;

  @IsString()
  @IsNotEmpty({ message: 'message may not be blank.' })
  message!: string;

  @IsOptional()
  @IsEnum(ReminderStatus, { message: 'status must be one of pending, sent, failed.' })
  status?: ReminderStatus;
}

export class UpdateReminderDto {
  @IsOptional()
  @IsInt({ message: 'studentId must be an integer.' })
  studentId?: number;

  @IsOptional()
  @ValidateIf(notNull)
  @IsInt({ message: 'courseId must be an integer.' })
  courseId?: number | null;

  @IsOptional()
  @ValidateIf(notNull)
  @IsInt({ message: 'batchId must be an integer.' })
  batchId?: number | null;

  @IsOptional()
  @IsString()
  @IsNotEmpty({ message: 'message may not be blank.' })
  message?: string;

  @IsOptional()
  @IsEnum(ReminderStatus, { message: 'status must be one of pending, sent, failed.' })
  status?: ReminderStatus;
}

export class ReminderQueryDto extends ListQueryDto {
  @IsOptional()
  @IsEnum(ReminderStatus)
  status?: ReminderStatus;

  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'student must be an integer.' })
  student?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'course must be an integer.' })
  course?: number;
}
