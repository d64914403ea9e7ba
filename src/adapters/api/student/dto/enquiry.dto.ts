// src/adapters/api/student/dto/enquiry.dto.ts
import { EnquiryStatus } from '@app-types/models/student.types';
import { IsEmail, IsEnum, IsNotEmpty, IsOptional, IsString, Matches, MaxLength } from 'class-validator';
import { ListQueryDto } from '../../dto/list-query.dto';

const PHONE_PATTERN = /^[0-9+() -]+$/;
const PHONE_MESSAGE = 'Invalid phone number format.';

export class CreateEnquiryDto {
  @IsString()
  @IsNotEmpty({ message: 'name may not be blank.' })
  @MaxLength(100)
  name!: string;

  @IsString()
  @MaxLength(15, { message: 'phone must be at most 15 characters.' })
  @Matches(PHONE_PATTERN, { message: PHONE_MESSAGE })
  phone!: string;

  @IsOptional()
  @IsEmail({}, { message: 'Enter a valid email address.' })
  email?: string;

  @IsString()
  @IsNotEmpty({ message: 'courseInterest may not be blank.' })
  @MaxLength(100)
  courseInterest!: string;

  @IsOptional()
  @IsString()
  @MaxLength(50)
  source?: string;

  @IsOptional()
  @IsEnum(EnquiryStatus, { message: 'status must be one of new, follow_up, converted, closed.' })
  status?: EnquiryStatus;

  @IsOptional()
  @IsString()
  notes?: string | null;
}

export class UpdateEnquiryDto {
  @IsOptional()
  @IsString()
  @MaxLength(100)
  name?: string;

  @IsOptional()
  @IsString()
  @MaxLength(15, { message: 'phone must be at most 15 characters.' })
  @Matches(PHONE_PATTERN, { message: PHONE_MESSAGE })
  phone?: string;

  @IsOptional()
  @IsEmail({}, { message: 'Enter a valid email address.' })
  email?: string;

  @IsOptional()
  @IsString()
  @MaxLength(100)
  courseInterest?: string;

  @IsOptional()
  @IsString()
  @MaxLength(50)
  source?: string;

  @IsOptional()
  @IsEnum(EnquiryStatus, { message: 'status must be one of new, follow_up, converted, closed.' })
  status?: EnquiryStatus;

  @IsOptional()
  @IsString()
  notes?: string | null;
}

export class EnquiryQueryDto extends ListQueryDto {
  @IsOptional()
  @IsEnum(EnquiryStatus)
  status?: EnquiryStatus;

  @IsOptional()
  @IsString()
  courseInterest?: string;
}
