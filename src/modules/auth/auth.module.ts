// src/modules/auth/auth.module.ts

import { TokenHelper } from '@core/common/token/token.helper';
import { CoreJwtModule } from '@core/jwt/jwt.module';
import { Module } from '@nestjs/common';
import { PassportModule } from '@nestjs/passport';
import { AccountServiceModule } from '@src/modules/account/account-service.module';
import { JwtStrategy } from './strategies/jwt.strategy';

/**
 * 认证模块：JWT 签发/校验与 passport 策略
 */
@Module({
  imports: [
    AccountServiceModule,
    CoreJwtModule,
    PassportModule.register({ defaultStrategy: 'jwt' }),
  ],
  providers: [TokenHelper, JwtStrategy],
  exports: [TokenHelper, PassportModule],
})
export class AuthModule {}
