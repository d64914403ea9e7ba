// src/adapters/api/auth/auth.controller.ts
import { ConfirmPasswordResetUsecase } from '@usecases/auth/confirm-password-reset.usecase';
import { LoginUsecase } from '@usecases/auth/login.usecase';
import { RefreshTokenUsecase } from '@usecases/auth/refresh-token.usecase';
import { RequestPasswordResetUsecase } from '@usecases/auth/request-password-reset.usecase';
import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { toUserView, type UserView } from '../account/account.presenter';
import { Public } from '../decorators/public.decorator';
import type { DetailResponse } from '../dto/detail.dto';
import {
  PasswordResetConfirmDto,
  PasswordResetRequestDto,
  RefreshRequestDto,
  TokenRequestDto,
} from './dto/auth.dto';

/**
 * 认证接口：签发/刷新令牌与找回密码
 */
@ApiTags('auth')
@Public()
@Controller('auth')
export class AuthController {
  constructor(
    private readonly loginUsecase: LoginUsecase,
    private readonly refreshTokenUsecase: RefreshTokenUsecase,
    private readonly requestPasswordResetUsecase: RequestPasswordResetUsecase,
    private readonly confirmPasswordResetUsecase: ConfirmPasswordResetUsecase,
  ) {}

  @Post('token')
  @HttpCode(HttpStatus.OK)
  async token(
    @Body() body: TokenRequestDto,
  ): Promise<{ access: string; refresh: string; user: UserView }> {
    const result = await this.loginUsecase.execute(body);
    return { access: result.access, refresh: result.refresh, user: toUserView(result.user) };
  }

  @Post('token/refresh')
  @HttpCode(HttpStatus.OK)
  async refresh(@Body() body: RefreshRequestDto): Promise<{ access: string }> {
    return this.refreshTokenUsecase.execute(body);
  }

  @Post('password-reset')
  @HttpCode(HttpStatus.OK)
  async requestReset(@Body() body: PasswordResetRequestDto): Promise<DetailResponse> {
    return this.requestPasswordResetUsecase.execute(body);
  }

  @Post('password-reset-confirm')
  @HttpCode(HttpStatus.OK)
  async confirmReset(@Body() body: PasswordResetConfirmDto): Promise<DetailResponse> {
    return this.confirmPasswordResetUsecase.execute(body);
  }
}
