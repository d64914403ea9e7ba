// src/usecases/finance/send-reminder.usecase.ts
import { ReminderStatus } from '@app-types/models/finance.types';
import { MailService } from '@src/infrastructure/mail/mail.service';
import { ReminderEntity } from '@modules/finance/reminder.entity';
import { ReminderService } from '@modules/finance/reminder.service';
import { Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';

export const REMINDER_SUBJECT = 'Fee Reminder';

/**
 * 发送提醒邮件并回写状态
 * 学员无邮箱或发送失败时记为 failed，不向调用方抛出
 */
@Injectable()
export class SendReminderUsecase {
  constructor(
    private readonly reminderService: ReminderService,
    private readonly mailService: MailService,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(SendReminderUsecase.name);
  }

  async execute(reminderId: number): Promise<ReminderEntity> {
    const reminder = await this.reminderService.getOrThrow(reminderId);
    const email = reminder.student?.user?.email?.trim();

    let status: ReminderStatus;
    if (!email) {
      this.logger.warn({ reminderId, studentId: reminder.studentId }, '学员未登记邮箱，提醒发送失败');
      status = ReminderStatus.FAILED;
    } else {
      try {
        await this.mailService.send({ to: email, subject: REMINDER_SUBJECT, text: reminder.message });
        status = ReminderStatus.SENT;
        this.logger.info({ reminderId, to: email }, '提醒邮件已发送');
      } catch (error) {
        this.logger.error(
          { reminderId, error: error instanceof Error ? error.message : String(error) },
          '提醒邮件发送失败',
        );
        status = ReminderStatus.FAILED;
      }
    }

    await this.reminderService.setStatus(reminderId, status);
    return this.reminderService.getOrThrow(reminderId);
  }
}
