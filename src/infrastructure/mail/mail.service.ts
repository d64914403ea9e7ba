// src/infrastructure/mail/mail.service.ts
import sgMail from '@sendgrid/mail';
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PinoLogger } from 'nestjs-pino';

export interface OutgoingMail {
  readonly to: string;
  readonly subject: string;
  readonly text: string;
  readonly html?: string;
}

export type MailDeliveryResult = 'sent' | 'skipped';

/**
 * 邮件发送服务（SendGrid）
 * 未配置 API Key 时仅记录日志并返回 skipped
 */
@Injectable()
export class MailService {
  private readonly from: string;
  private readonly configured: boolean;

  constructor(
    private readonly config: ConfigService,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(MailService.name);
    const apiKey = this.config.get<string>('mail.sendgridApiKey', '');
    this.from = this.config.get<string>('mail.from', 'no-reply@institute.local');
    this.configured = apiKey.length > 0;
    if (this.configured) sgMail.setApiKey(apiKey);
  }

  /**
   * 发送邮件；发送失败时抛出原始错误，由调用方决定状态
   */
  async send(mail: OutgoingMail): Promise<MailDeliveryResult> {
    if (!this.configured) {
      this.logger.info({ to: mail.to, subject: mail.subject }, '未配置 SendGrid，跳过发送');
      return 'skipped';
    }

    await sgMail.send({
      to: mail.to,
      from: this.from,
      subject: mail.subject,
      text: mail.text,
      ...(mail.html ? { html: mail.html } : {}),
    });
    this.logger.info({ to: mail.to, subject: mail.subject }, '邮件已发送');
    return 'sent';
  }
}
