// src/usecases/auth/auth-usecases.module.ts
import { PasswordModule } from '@core/common/password/password.module';
import { AccountServiceModule } from '@modules/account/account-service.module';
import { AuthModule } from '@modules/auth/auth.module';
import { Module } from '@nestjs/common';
import { ConfirmPasswordResetUsecase } from './confirm-password-reset.usecase';
import { LoginUsecase } from './login.usecase';
import { RefreshTokenUsecase } from './refresh-token.usecase';
import { RequestPasswordResetUsecase } from './request-password-reset.usecase';

const USECASES = [
  LoginUsecase,
  RefreshTokenUsecase,
  RequestPasswordResetUsecase,
  ConfirmPasswordResetUsecase,
];

@Module({
  imports: [AuthModule, AccountServiceModule, PasswordModule],
  providers: USECASES,
  exports: USECASES,
})
export class AuthUsecasesModule {}
