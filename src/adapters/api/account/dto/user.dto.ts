// src/adapters/api/account/dto/user.dto.ts
import { Type } from 'class-transformer';
import {
  IsBoolean,
  IsEmail,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
  ValidateIf,
} from 'class-validator';
import { ListQueryDto, QueryBoolean } from '../../dto/list-query.dto';

/**
 * 资料字段：本人可改
 */
export class UpdateProfileDto {
  @IsOptional()
  @IsEmail({}, { message: 'Enter a valid email address.' })
  email?: string;

  @IsOptional()
  @IsString()
  @MaxLength(150)
  firstName?: string;

  @IsOptional()
  @IsString()
  @MaxLength(150)
  lastName?: string;

  @IsOptional()
  @IsString()
  @MaxLength(15, { message: 'phone must be at most 15 characters.' })
  phone?: string;

  @IsOptional()
  @IsString()
  address?: string | null;
}

/** 授权字段：仅管理员生效，由 usecase 过滤 */
class AdminUserFieldsDto extends UpdateProfileDto {
  @IsOptional()
  @ValidateIf((_object, value) => value !== null)
  @IsInt({ message: 'roleId must be an integer.' })
  roleId?: number | null;

  @IsOptional()
  @IsBoolean()
  isActive?: boolean;

  @IsOptional()
  @IsBoolean()
  isStaff?: boolean;

  @IsOptional()
  @IsBoolean()
  isSuperuser?: boolean;
}

export class UpdateUserDto extends AdminUserFieldsDto {
  @IsOptional()
  @IsString()
  @MaxLength(150, { message: 'username must be at most 150 characters.' })
  username?: string;

  @IsOptional()
  @IsString()
  password?: string;
}

export class CreateUserDto extends AdminUserFieldsDto {
  @IsString()
  @IsNotEmpty({ message: 'username may not be blank.' })
  @MaxLength(150, { message: 'username must be at most 150 characters.' })
  username!: string;

  @IsString()
  @IsNotEmpty({ message: 'password may not be blank.' })
  password!: string;
}

export class UserQueryDto extends ListQueryDto {
  @IsOptional()
  @QueryBoolean()
  @IsBoolean({ message: 'isActive must be a boolean.' })
  isActive?: boolean;

  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'roleId must be an integer.' })
  roleId?: number;
}
