// src/adapters/api/account/dto/role.dto.ts
import { IsNotEmpty, IsOptional, IsString, MaxLength } from 'class-validator';

export class CreateRoleDto {
  @IsString()
  @IsNotEmpty({ message: 'name may not be blank.' })
  @MaxLength(50, { message: 'name must be at most 50 characters.' })
  name!: string;

  @IsOptional()
  @IsString()
  description?: string | null;
}

export class UpdateRoleDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty({ message: 'name may not be blank.' })
  @MaxLength(50, { message: 'name must be at most 50 characters.' })
  name?: string;

  @IsOptional()
  @IsString()
  description?: string | null;
}
