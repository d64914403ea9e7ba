// src/usecases/finance/overdue-reminder.rule.ts
import { toCents } from '@core/common/numeric/money';
import { shouldCreateReminder } from '@core/finance/finance.policy';
import { CourseEntity } from '@modules/course/course.entity';
import { FeesReceiptService } from '@modules/finance/fees-receipt.service';
import { ReminderEntity } from '@modules/finance/reminder.entity';
import { ReminderService } from '@modules/finance/reminder.service';
import { Injectable } from '@nestjs/common';

export interface OverdueCheckInput {
  readonly studentId: number;
  readonly course: Pick<CourseEntity, 'id' | 'title' | 'totalFees'>;
  readonly batchId: number | null;
  /** 按欠费金额（分）生成提醒内容 */
  readonly message: (dueCents: number) => string;
  readonly now?: Date;
}

/**
 * 欠费提醒规则
 * 欠费为正且 7 天内未提醒过时，新建一条待发送提醒
 */
@Injectable()
export class OverdueReminderRule {
  constructor(
    private readonly receiptService: FeesReceiptService,
    private readonly reminderService: ReminderService,
  ) {}

  async apply(input: OverdueCheckInput): Promise<ReminderEntity | null> {
    const paid = await this.receiptService.paidCents(input.studentId, input.course.id);
    const due = toCents(input.course.totalFees) - paid;
    if (due <= 0) return null;

    const last = await this.reminderService.findLatest(input.studentId, input.course.id);
    const allowed = shouldCreateReminder({
      dueCents: due,
      lastReminderAt: last?.sentAt ?? null,
      now: input.now ?? new Date(),
    });
    if (!allowed) return null;

    return this.reminderService.create({
      studentId: input.studentId,
      courseId: input.course.id,
      batchId: input.batchId,
      message: input.message(due),
    });
  }
}
