// src/adapters/api/student/dto/student.dto.ts
import { Type } from 'class-transformer';
import {
  IsBoolean,
  IsDateString,
  IsEmail,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
  ValidateNested,
} from 'class-validator';
import { ListQueryDto, QueryBoolean } from '../../dto/list-query.dto';

/** 新学员关联账户 */
export class StudentUserPayloadDto {
  @IsString()
  @IsNotEmpty({ message: 'username may not be blank.' })
  @MaxLength(150)
  username!: string;

  @IsString()
  @IsNotEmpty({ message: 'password may not be blank.' })
  password!: string;

  @IsOptional()
  @IsEmail({}, { message: 'Enter a valid email address.' })
  email?: string;

  @IsOptional()
  @IsString()
  firstName?: string;

  @IsOptional()
  @IsString()
  lastName?: string;

  @IsOptional()
  @IsString()
  @MaxLength(15, { message: 'phone must be at most 15 characters.' })
  phone?: string;
}

export class UpdateStudentDto {
  @IsOptional()
  @IsString()
  @MaxLength(100)
  guardianName?: string;

  @IsOptional()
  @IsString()
  @MaxLength(15, { message: 'guardianPhone must be at most 15 characters.' })
  guardianPhone?: string;

  @IsOptional()
  @IsDateString({ strict: true }, { message: 'admissionDate must be a YYYY-MM-DD date.' })
  admissionDate?: string;

  @IsOptional()
  @IsString()
  address?: string | null;

  @IsOptional()
  @IsBoolean()
  active?: boolean;
}

export class CreateStudentDto extends UpdateStudentDto {
  // 缺失时由 usecase 返回字段级错误
  @IsOptional()
  @ValidateNested()
  @Type(() => StudentUserPayloadDto)
  userPayload?: StudentUserPayloadDto;
}

export class StudentQueryDto extends ListQueryDto {
  @IsOptional()
  @QueryBoolean()
  @IsBoolean({ message: 'active must be a boolean.' })
  active?: boolean;

  @IsOptional()
  @IsDateString({ strict: true }, { message: 'admissionDate must be a YYYY-MM-DD date.' })
  admissionDate?: string;
}
