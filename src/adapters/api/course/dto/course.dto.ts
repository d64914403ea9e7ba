// src/adapters/api/course/dto/course.dto.ts
import { EnrollmentStatus } from '@app-types/models/course.types';
import { Type } from 'class-transformer';
import {
  IsBoolean,
  IsDateString,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  MaxLength,
  Min,
  ValidateIf,
} from 'class-validator';
import { DecimalString } from '../../dto/decimal.dto';
import { ListQueryDto, QueryBoolean } from '../../dto/list-query.dto';

const DATE_OPTIONS = { strict: true } as const;

export class CreateCourseDto {
  @IsString()
  @IsNotEmpty({ message: 'code may not be blank.' })
  @MaxLength(20, { message: 'code must be at most 20 characters.' })
  code!: string;

  @IsString()
  @IsNotEmpty({ message: 'title may not be blank.' })
  @MaxLength(100, { message: 'title must be at most 100 characters.' })
  title!: string;

  @IsInt({ message: 'durationWeeks must be an integer.' })
  @Min(1, { message: 'durationWeeks must be at least 1.' })
  durationWeeks!: number;

  @DecimalString({ field: 'totalFees' })
  totalFees!: string;

  @IsOptional()
  @IsString()
  syllabus?: string | null;

  @IsOptional()
  @IsBoolean()
  active?: boolean;

  @IsOptional()
  @IsInt({ message: 'requiredAttendanceDays must be an integer.' })
  @Min(0, { message: 'requiredAttendanceDays must not be negative.' })
  requiredAttendanceDays?: number;
}

export class UpdateCourseDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty({ message: 'code may not be blank.' })
  @MaxLength(20, { message: 'code must be at most 20 characters.' })
  code?: string;

  @IsOptional()
  @IsString()
  @MaxLength(100, { message: 'title must be at most 100 characters.' })
  title?: string;

  @IsOptional()
  @IsInt({ message: 'durationWeeks must be an integer.' })
  @Min(1, { message: 'durationWeeks must be at least 1.' })
  durationWeeks?: number;

  @IsOptional()
  @DecimalString({ field: 'totalFees' })
  totalFees?: string;

  @IsOptional()
  @IsString()
  syllabus?: string | null;

  @IsOptional()
  @IsBoolean()
  active?: boolean;

  @IsOptional()
  @IsInt({ message: 'requiredAttendanceDays must be an integer.' })
  @Min(0, { message: 'requiredAttendanceDays must not be negative.' })
  requiredAttendanceDays?: number;
}

export class CourseQueryDto extends ListQueryDto {
  @IsOptional()
  @QueryBoolean()
  @IsBoolean({ message: 'active must be a boolean.' })
  active?: boolean;

  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'durationWeeks must be an integer.' })
  durationWeeks?: number;
}

export class CreateTrainerDto {
  @IsInt({ message: 'userId must be an integer.' })
  userId!: number;

  @IsString()
  @IsNotEmpty({ message: 'empNo may not be blank.' })
  @MaxLength(20)
  empNo!: string;

  @IsDateString(DATE_OPTIONS, { message: 'joinDate must be a YYYY-MM-DD date.' })
  joinDate!: string;

  @IsOptional()
  @DecimalString({ field: 'salary' })
  salary?: string;

  @IsOptional()
  @IsBoolean()
  isActive?: boolean;
}

export class UpdateTrainerDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty({ message: 'empNo may not be blank.' })
  @MaxLength(20)
  empNo?: string;

  @IsOptional()
  @IsDateString(DATE_OPTIONS, { message: 'joinDate must be a YYYY-MM-DD date.' })
  joinDate?: string;

  @IsOptional()
  @DecimalString({ field: 'salary' })
  salary?: string;

  @IsOptional()
  @IsBoolean()
  isActive?: boolean;
}

export class TrainerQueryDto extends ListQueryDto {
  @IsOptional()
  @QueryBoolean()
  @IsBoolean({ message: 'isActive must be a boolean.' })
  isActive?: boolean;

  @IsOptional()
  @IsDateString(DATE_OPTIONS, { message: 'joinDate must be a YYYY-MM-DD date.' })
  joinDate?: string;
}

const notNull = (_object: object, value: unknown): boolean => value !== null;

export class CreateBatchDto {
  @IsInt({ message: 'courseId must be an integer.' })
  courseId!: number;

  @IsOptional()
  @ValidateIf(notNull)
  @IsInt({ message: 'trainerId must be an integer.' })
  trainerId?: number | null;

  @IsString()
  @IsNotEmpty({ message: 'code may not be blank.' })
  @MaxLength(20)
  code!: string;

  @IsDateString(DATE_OPTIONS, { message: 'startDate must be a YYYY-MM-DD date.' })
  startDate!: string;

  @IsDateString(DATE_OPTIONS, { message: 'endDate must be a YYYY-MM-DD date.' })
  endDate!: string;

  @IsOptional()
  @IsInt({ message: 'capacity must be an integer.' })
  @Min(1, { message: 'capacity must be at least 1.' })
  capacity?: number;

  @IsOptional()
  @ValidateIf(notNull)
  @IsObject({ message: 'schedule must be an object.' })
  schedule?: Record<string, string> | null;
}

export class UpdateBatchDto {
  @IsOptional()
  @IsInt({ message: 'courseId must be an integer.' })
  courseId?: number;

  @IsOptional()
  @ValidateIf(notNull)
  @IsInt({ message: 'trainerId must be an integer.' })
  trainerId?: number | null;

  @IsOptional()
  @IsString()
  @IsNotEmpty({ message: 'code may not be blank.' })
  @MaxLength(20)
  code?: string;

  @IsOptional()
  @IsDateString(DATE_OPTIONS, { message: 'startDate must be a YYYY-MM-DD date.' })
  startDate?: string;

  @IsOptional()
  @IsDateString(DATE_OPTIONS, { message: 'endDate must be a YYYY-MM-DD date.' })
  endDate?: string;

  @IsOptional()
  @IsInt({ message: 'capacity must be an integer.' })
  @Min(1, { message: 'capacity must be at least 1.' })
  capacity?: number;

  @IsOptional()
  @ValidateIf(notNull)
  @IsObject({ message: 'schedule must be an object.' })
  schedule?: Record<string, string> | null;
}

export class BatchQueryDto extends ListQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'course must be an integer.' })
  course?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'trainer must be an integer.' })
  trainer?: number;

  @IsOptional()
  @IsDateString(DATE_OPTIONS, { message: 'startDate must be a YYYY-MM-DD date.' })
  startDate?: string;
}

export class CreateEnrollmentDto {
  @IsInt({ message: 'studentId must be an integer.' })
  studentId!: number;

  @IsInt({ message: 'batchId must be an integer.' })
  batchId!: number;

  @IsOptional()
  @IsDateString(DATE_OPTIONS, { message: 'enrolledOn must be a YYYY-MM-DD date.' })
  enrolledOn?: string;

  @IsOptional()
  @IsEnum(EnrollmentStatus, { message: 'status must be one of active, completed, dropped.' })
  status?: EnrollmentStatus;
}

export class UpdateEnrollmentDto {
  @IsOptional()
  @IsDateString(DATE_OPTIONS, { message: 'enrolledOn must be a YYYY-MM-DD date.' })
  enrolledOn?: string;

  @IsOptional()
  @IsEnum(EnrollmentStatus, { message: 'status must be one of active, completed, dropped.' })
  status?: EnrollmentStatus;
}

export class EnrollmentQueryDto extends ListQueryDto {
  @IsOptional()
  @IsEnum(EnrollmentStatus)
  status?: EnrollmentStatus;

  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'batch must be an integer.' })
  batch?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'student must be an integer.' })
  student?: number;
}
