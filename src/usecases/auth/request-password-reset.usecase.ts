// src/usecases/auth/request-password-reset.usecase.ts
import { TokenHelper } from '@core/common/token/token.helper';
import { MailService } from '@src/infrastructure/mail/mail.service';
import { UserService } from '@modules/account/user.service';
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PinoLogger } from 'nestjs-pino';

export const PASSWORD_RESET_REQUESTED_MESSAGE =
  'If an account exists for this email, a reset link has been sent.';

/**
 * 申请重置密码
 * 无论邮箱是否存在都返回同一提示
 */
@Injectable()
export class RequestPasswordResetUsecase {
  constructor(
    private readonly userService: UserService,
    private readonly tokenHelper: TokenHelper,
    private readonly mailService: MailService,
    private readonly config: ConfigService,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(RequestPasswordResetUsecase.name);
  }

  async execute({ email }: { readonly email: string }): Promise<{ detail: string }> {
    const user = await this.userService.findActiveByEmail(email.trim());
    if (!user) {
      this.logger.info({ email }, '重置密码：邮箱未匹配启用账户');
      return { detail: PASSWORD_RESET_REQUESTED_MESSAGE };
    }

    const token = this.tokenHelper.generatePasswordResetToken({
      userId: user.id,
      passwordHash: user.passwordHash,
      expiresIn: this.config.get<string>('jwt.passwordResetExpiresIn', '30m'),
    });
    const frontendUrl = this.config.get<string>('server.frontendUrl', 'http://localhost:5173');
    const link = `${frontendUrl.replace(/\/+$/, '')}/reset-password?token=${encodeURIComponent(token)}`;

    try {
      await this.mailService.send({
        to: user.email,
        subject: 'Password Reset Request',
        text: `Hello ${user.username},\n\nUse the link below to reset your password:\n${link}\n\nIf you did not request this, you can ignore this email.`,
      });
    } catch (error) {
      // 邮件失败不改变响应，避免据此探测账户
      this.logger.error(
        { userId: user.id, error: error instanceof Error ? error.message : String(error) },
        '重置密码邮件发送失败',
      );
    }
    return { detail: PASSWORD_RESET_REQUESTED_MESSAGE };
  }
}
