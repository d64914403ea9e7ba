// src/usecases/auth/login.usecase.ts
import { buildAccessGroup } from '@app-types/models/account.types';
import { AUTH_ERROR, DomainError } from '@core/common/errors/domain-error';
import { TokenHelper } from '@core/common/token/token.helper';
import { UserEntity } from '@modules/account/user.entity';
import { UserService } from '@modules/account/user.service';
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PinoLogger } from 'nestjs-pino';

export const INVALID_CREDENTIALS_MESSAGE = 'No active account found with the given credentials';

export interface LoginInput {
  readonly username: string;
  readonly password: string;
}

export interface LoginResult {
  readonly access: string;
  readonly refresh: string;
  readonly user: UserEntity;
}

/**
 * 用户名密码登录用例
 * 账户停用与凭据错误返回同一错误，避免暴露账户状态
 */
@Injectable()
export class LoginUsecase {
  constructor(
    private readonly userService: UserService,
    private readonly tokenHelper: TokenHelper,
    private readonly config: ConfigService,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(LoginUsecase.name);
  }

  async execute({ username, password }: LoginInput): Promise<LoginResult> {
    const user = await this.userService.findByUsername(username.trim());
    if (!user || !user.isActive || !this.userService.verifyPassword(user, password)) {
      this.logger.warn({ username, found: Boolean(user) }, '登录失败：凭据无效或账户停用');
      throw new DomainError(AUTH_ERROR.INVALID_CREDENTIALS, INVALID_CREDENTIALS_MESSAGE);
    }

    await this.userService.touchLastLogin(user);

    const payload = this.tokenHelper.createPayloadFromUser({
      id: user.id,
      username: user.username,
      email: user.email || null,
      accessGroup: buildAccessGroup({
        isSuperuser: user.isSuperuser,
        isStaff: user.isStaff,
      }),
    });
    const access = this.tokenHelper.generateAccessToken({ payload });
    const refresh = this.tokenHelper.generateRefreshToken({
      payload: { sub: user.id },
      expiresIn: this.config.get<string>('jwt.refreshExpiresIn', '7d'),
    });

    this.logger.info({ userId: user.id, accessGroup: payload.accessGroup }, '登录成功');
    return { access, refresh, user };
  }
}
