// src/usecases/notification/daily-notifications.job.ts
import { NotificationLevel } from '@app-types/models/notification.types';
import { tomorrowString } from '@core/common/date/date.helper';
import type { DailyJob } from '@modules/common/scheduling/daily-job.scheduler';
import { BatchService } from '@modules/course/batch.service';
import { FeesReceiptService } from '@modules/finance/fees-receipt.service';
import { NotificationService } from '@modules/notification/notification.service';
import { StudentService } from '@modules/student/student.service';
import { Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';

export const UPCOMING_BATCH_TITLE = 'Upcoming Batch Reminder';
export const PENDING_FEE_TITLE = 'Pending Fee Payment';
export const PENDING_FEE_MESSAGE = 'You have not made your first fee payment. Please contact the admin.';

/**
 * 每日通知
 * - 明日开班的讲师收到开班提醒
 * - 从未缴费的在读学员收到一次缴费提醒
 */
@Injectable()
export class DailyNotificationsJob implements DailyJob {
  readonly name = 'daily-notifications';
  readonly timeConfigKey = 'scheduler.dailyNotificationsAt';
  readonly defaultTime = '10:00';

  constructor(
    private readonly batchService: BatchService,
    private readonly studentService: StudentService,
    private readonly receiptService: FeesReceiptService,
    private readonly notificationService: NotificationService,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(DailyNotificationsJob.name);
  }

  async run(now: Date = new Date()): Promise<{ created: number }> {
    let created = 0;

    const batches = await this.batchService.findStartingOn(tomorrowString(now));
    for (const batch of batches) {
      const userId = batch.trainer?.userId;
      if (userId === undefined) continue;
      await this.notificationService.create(userId, {
        title: UPCOMING_BATCH_TITLE,
        message: `Your batch '${batch.code}' starts tomorrow.`,
        level: NotificationLevel.INFO,
      });
      created += 1;
    }

    const students = await this.studentService.findActiveWithActiveUser();
    const paying = await this.receiptService.studentIdsWithReceipts(students.map((s) => s.id));
    for (const student of students) {
      if (paying.has(student.id)) continue;
      const result = await this.notificationService.getOrCreate(student.userId, {
        title: PENDING_FEE_TITLE,
        message: PENDING_FEE_MESSAGE,
        level: NotificationLevel.WARNING,
      });
      if (result.created) created += 1;
    }

    this.logger.info({ created, batches: batches.length }, '每日通知已生成');
    return { created };
  }
}
