// src/usecases/auth/confirm-password-reset.usecase.ts
import { AUTH_ERROR, DomainError, isDomainError } from '@core/common/errors/domain-error';
import { PasswordPolicyService } from '@core/common/password/password-policy.service';
import { TokenHelper, fingerprintPasswordHash } from '@core/common/token/token.helper';
import { UserService } from '@modules/account/user.service';
import { Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';

export const INVALID_RESET_TOKEN_MESSAGE = 'Invalid or expired token.';

/**
 * 确认重置密码
 * 令牌绑定签发时的密码哈希指纹，密码一旦变更令牌即失效
 */
@Injectable()
export class ConfirmPasswordResetUsecase {
  constructor(
    private readonly userService: UserService,
    private readonly tokenHelper: TokenHelper,
    private readonly passwordPolicy: PasswordPolicyService,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(ConfirmPasswordResetUsecase.name);
  }

  async execute(input: {
    readonly token: string;
    readonly newPassword: string;
  }): Promise<{ detail: string }> {
    const payload = this.verify(input.token);
    if (payload.type !== 'password_reset' || !payload.pwd) throw this.invalid();

    const user = await this.userService.findById(payload.sub);
    if (!user || !user.isActive) throw this.invalid();
    if (fingerprintPasswordHash(user.passwordHash) !== payload.pwd) {
      this.logger.warn({ userId: user.id }, '重置密码令牌已失效（密码已变更）');
      throw this.invalid();
    }

    this.passwordPolicy.assertValid(input.newPassword);

    await this.userService.changePassword(user, input.newPassword, user.username);
    this.logger.info({ userId: user.id }, '密码已重置');
    return { detail: 'Password has been reset.' };
  }

  private verify(token: string): ReturnType<TokenHelper['verifyToken']> {
    try {
      return this.tokenHelper.verifyToken({ token });
    } catch (error) {
      if (isDomainError(error)) throw this.invalid(error);
      throw error;
    }
  }

  private invalid(cause?: unknown): DomainError {
    return new DomainError(AUTH_ERROR.INVALID_RESET_TOKEN, INVALID_RESET_TOKEN_MESSAGE, undefined, cause);
  }
}
