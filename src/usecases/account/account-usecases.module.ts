// src/usecases/account/account-usecases.module.ts
import { PasswordModule } from '@core/common/password/password.module';
import { AccountServiceModule } from '@modules/account/account-service.module';
import { Module } from '@nestjs/common';
import { CreateUserUsecase } from './create-user.usecase';
import { UpdateUserUsecase } from './update-user.usecase';

@Module({
  imports: [AccountServiceModule, PasswordModule],
  providers: [CreateUserUsecase, UpdateUserUsecase],
  exports: [CreateUserUsecase, UpdateUserUsecase],
})
export class AccountUsecasesModule {}
