// src/adapters/api/finance/dto/receipt.dto.ts
import { PaymentMode } from '@app-types/models/finance.types';
import { Type } from 'class-transformer';
import {
  IsBoolean,
  IsDateString,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
  ValidateIf,
} from 'class-validator';
import { DecimalString } from '../../dto/decimal.dto';
import { ListQueryDto, QueryBoolean } from '../../dto/list-query.dto';

const DATE_OPTIONS = { strict: true } as const;
const MODE_MESSAGE = 'mode must be one of cash, upi, bank, card.';
const notNull = (_object: object, value: unknown): boolean => value !== null;

/** 金额允许负号通过，由用例给出 'Amount must be non-negative.' */
export class CreateReceiptDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty({ message: 'receiptNo may not be blank.' })
  @MaxLength(30)
  receiptNo?: string;

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

  @DecimalString({ field: 'amount', signed: true })
  amount!: string;

  @IsEnum(PaymentMode, { message: MODE_MESSAGE })
  mode!: PaymentMode;

  @IsOptional()
  @IsString()
  @MaxLength(50)
  txnId?: string;

  @IsOptional()
  @IsDateString(DATE_OPTIONS, { message: 'date must be a YYYY-MM-DD date.' })
  date?: string;
}

export class UpdateReceiptDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty({ message: 'receiptNo may not be blank.' })
  @MaxLength(30)
  receiptNo?: string;

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
  @DecimalString({ field: 'amount', signed: true })
  amount?: string;

  @IsOptional()
  @IsEnum(PaymentMode, { message: MODE_MESSAGE })
  mode?: PaymentMode;

  @IsOptional()
  @IsString()
  @MaxLength(50)
  txnId?: string;

  @IsOptional()
  @IsDateString(DATE_OPTIONS, { message: 'date must be a YYYY-MM-DD date.' })
  date?: string;
}

export class ReceiptQueryDto extends ListQueryDto {
  @IsOptional()
  @IsEnum(PaymentMode, { message: MODE_MESSAGE })
  mode?: PaymentMode;

  @IsOptional()
  @QueryBoolean()
  @IsBoolean({ message: 'locked must be a boolean.' })
  locked?: boolean;

  @IsOptional()
  @IsDateString(DATE_OPTIONS, { message: 'date must be a YYYY-MM-DD date.' })
  date?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'student must be an integer.' })
  student?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'course must be an integer.' })
  course?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'batch must be an integer.' })
  batch?: number;
}
