// src/adapters/api/student/dto/measurement.dto.ts
import { IsDateString, IsOptional, IsString, ValidateIf } from 'class-validator';
import { DecimalString } from '../../dto/decimal.dto';

const notNull = (_object: object, value: unknown): boolean => value !== null;

/** 量体尺寸：DECIMAL(5,2)，可为空 */
export class MeasurementDto {
  @IsOptional()
  @IsDateString({ strict: true }, { message: 'dateTaken must be a YYYY-MM-DD date.' })
  dateTaken?: string;

  @IsOptional()
  @ValidateIf(notNull)
  @DecimalString({ field: 'neck' })
  neck?: string | null;

  @IsOptional()
  @ValidateIf(notNull)
  @DecimalString({ field: 'chest' })
  chest?: string | null;

  @IsOptional()
  @ValidateIf(notNull)
  @DecimalString({ field: 'waist' })
  waist?: string | null;

  @IsOptional()
  @ValidateIf(notNull)
  @DecimalString({ field: 'hips' })
  hips?: string | null;

  @IsOptional()
  @ValidateIf(notNull)
  @DecimalString({ field: 'sleeveLength' })
  sleeveLength?: string | null;

  @IsOptional()
  @ValidateIf(notNull)
  @DecimalString({ field: 'inseam' })
  inseam?: string | null;

  @IsOptional()
  @IsString()
  notes?: string | null;
}
