// src/adapters/api/event/dto/event.dto.ts
import { IsDateString, IsNotEmpty, IsOptional, IsString, MaxLength, ValidateIf } from 'class-validator';

const DATE_OPTIONS = { strict: true } as const;

export class CreateEventDto {
  @IsString()
  @IsNotEmpty({ message: 'title may not be blank.' })
  @MaxLength(200, { message: 'title must be at most 200 characters.' })
  title!: string;

  @IsOptional()
  @IsString()
  description?: string | null;

  @IsDateString(DATE_OPTIONS, { message: 'startDate must be a YYYY-MM-DD date.' })
  startDate!: string;

  /** 省略或为 null 时取开始日期 */
  @IsOptional()
  @ValidateIf((_object: object, value: unknown) => value !== null)
  @IsDateString(DATE_OPTIONS, { message: 'endDate must be a YYYY-MM-DD date.' })
  endDate?: string | null;
}

export class UpdateEventDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty({ message: 'title may not be blank.' })
  @MaxLength(200, { message: 'title must be at most 200 characters.' })
  title?: string;

  @IsOptional()
  @IsString()
  description?: string | null;

  @IsOptional()
  @IsDateString(DATE_OPTIONS, { message: 'startDate must be a YYYY-MM-DD date.' })
  startDate?: string;

  @IsOptional()
  @ValidateIf((_object: object, value: unknown) => value !== null)
  @IsDateString(DATE_OPTIONS, { message: 'endDate must be a YYYY-MM-DD date.' })
  endDate?: string | null;
}
