// src/adapters/api/attendance/dto/attendance.dto.ts
import { Type } from 'class-transformer';
import {
  IsArray,
  IsDateString,
  IsInt,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { ListQueryDto } from '../../dto/list-query.dto';

const DATE_OPTIONS = { strict: true } as const;

/** 状态码合法性由用例统一校验（P/A/L） */
export class AttendanceEntryDto {
  @IsInt({ message: 'studentId must be an integer.' })
  studentId!: number;

  @IsString({ message: 'status must be a string.' })
  status!: string;
}

export class CreateAttendanceDto {
  @IsInt({ message: 'batchId must be an integer.' })
  batchId!: number;

  @IsDateString(DATE_OPTIONS, { message: 'date must be a YYYY-MM-DD date.' })
  date!: string;

  @IsOptional()
  @IsString()
  remarks?: string | null;

  @IsOptional()
  @IsArray({ message: 'entries must be an array.' })
  @ValidateNested({ each: true })
  @Type(() => AttendanceEntryDto)
  entries?: AttendanceEntryDto[];
}

export class UpdateAttendanceDto {
  @IsOptional()
  @IsInt({ message: 'batchId must be an integer.' })
  batchId?: number;

  @IsOptional()
  @IsDateString(DATE_OPTIONS, { message: 'date must be a YYYY-MM-DD date.' })
  date?: string;

  @IsOptional()
  @IsString()
  remarks?: string | null;

  @IsOptional()
  @IsArray({ message: 'entries must be an array.' })
  @ValidateNested({ each: true })
  @Type(() => AttendanceEntryDto)
  entries?: AttendanceEntryDto[];
}

export class AttendanceQueryDto extends ListQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'batch must be an integer.' })
  batch?: number;

  @IsOptional()
  @IsDateString(DATE_OPTIONS, { message: 'date must be a YYYY-MM-DD date.' })
  date?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'course must be an integer.' })
  course?: number;
}
