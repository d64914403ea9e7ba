// src/usecases/finance/fees-receipt-saved.handler.ts
import {
  type IntegrationEventEnvelope,
  readPayloadId,
} from '@core/common/integration-events/events.types';
import { receiptReminderMessage } from '@core/finance/finance.policy';
import type { IntegrationEventHandler } from '@modules/common/integration-events/outbox.dispatcher';
import { FeesReceiptService } from '@modules/finance/fees-receipt.service';
import { Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';
import { OverdueReminderRule } from './overdue-reminder.rule';

/**
 * FeesReceiptSaved 事件处理器：缴费后仍有欠费时生成待发送提醒
 */
@Injectable()
export class FeesReceiptSavedHandler implements IntegrationEventHandler {
  readonly type = 'FeesReceiptSaved' as const;

  constructor(
    private readonly receiptService: FeesReceiptService,
    private readonly overdueRule: OverdueReminderRule,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(FeesReceiptSavedHandler.name);
  }

  async handle({ envelope }: { readonly envelope: IntegrationEventEnvelope }): Promise<void> {
    const receiptId = readPayloadId(envelope.payload, 'receiptId');
    if (!receiptId) {
      this.logger.warn({ payload: envelope.payload }, '事件缺少 receiptId');
      return;
    }
    // 收据可能已在投递前被删除
    const receipt = await this.receiptService.findById(receiptId);
    if (!receipt?.course) return;

    const firstName = receipt.student?.user?.firstName ?? '';
    const course = receipt.course;
    const reminder = await this.overdueRule.apply({
      studentId: receipt.studentId,
      course,
      batchId: receipt.batchId,
      message: (due) => receiptReminderMessage(firstName, course.title, due),
    });
    if (reminder) {
      this.logger.info(
        { receiptId, reminderId: reminder.id, studentId: receipt.studentId },
        '缴费后仍有欠费，已生成提醒',
      );
    }
  }
}
