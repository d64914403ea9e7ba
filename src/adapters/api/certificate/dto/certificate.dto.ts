// src/adapters/api/certificate/dto/certificate.dto.ts
import { Type } from 'class-transformer';
import { IsBoolean, IsDateString, IsInt, IsOptional, IsString } from 'class-validator';
import { ListQueryDto, QueryBoolean } from '../../dto/list-query.dto';

export class IssueCertificateDto {
  @IsInt({ message: 'studentId must be an integer.' })
  studentId!: number;

  @IsInt({ message: 'courseId must be an integer.' })
  courseId!: number;

  @IsOptional()
  @IsDateString({ strict: true }, { message: 'issueDate must be a YYYY-MM-DD date.' })
  issueDate?: string;

  @IsOptional()
  @IsString()
  remarks?: string;
}

/** 签发后仅备注可改，吊销走独立接口 */
export class UpdateCertificateDto {
  @IsOptional()
  @IsString()
  remarks?: string;
}

export class CertificateQueryDto extends ListQueryDto {
  @IsOptional()
  @QueryBoolean()
  @IsBoolean({ message: 'revoked must be a boolean.' })
  revoked?: boolean;

  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'course must be an integer.' })
  course?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'student must be an integer.' })
  student?: number;
}
