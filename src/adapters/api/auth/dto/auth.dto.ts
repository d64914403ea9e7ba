// src/adapters/api/auth/dto/auth.dto.ts
import { IsEmail, IsNotEmpty, IsString } from 'class-validator';

export class TokenRequestDto {
  @IsString()
  @IsNotEmpty({ message: 'username may not be blank.' })
  username!: string;

  @IsString()
  @IsNotEmpty({ message: 'password may not be blank.' })
  password!: string;
}

export class RefreshRequestDto {
  @IsString()
  @IsNotEmpty({ message: 'refresh may not be blank.' })
  refresh!: string;
}

export class PasswordResetRequestDto {
  @IsEmail({}, { message: 'Enter a valid email address.' })
  email!: string;
}

export class PasswordResetConfirmDto {
  @IsString()
  @IsNotEmpty({ message: 'token may not be blank.' })
  token!: string;

  @IsString()
  @IsNotEmpty({ message: 'newPassword may not be blank.' })
  newPassword!: string;
}
