// src/usecases/finance/fee-reminder-created.handler.ts
import { ReminderStatus } from '@app-types/models/finance.types';
import {
  type IntegrationEventEnvelope,
  readPayloadId,
} from '@core/common/integration-events/events.types';
import type { IntegrationEventHandler } from '@modules/common/integration-events/outbox.dispatcher';
import { ReminderService } from '@modules/finance/reminder.service';
import { Injectable } from '@nestjs/common';
import { SendReminderUsecase } from './send-reminder.usecase';

/**
 * FeeReminderCreated 事件处理器：只发送仍处于 pending 的提醒
 */
@Injectable()
export class FeeReminderCreatedHandler implements IntegrationEventHandler {
  readonly type = 'FeeReminderCreated' as const;

  constructor(
    private readonly reminderService: ReminderService,
    private readonly sendReminder: SendReminderUsecase,
  ) {}

  async handle({ envelope }: { readonly envelope: IntegrationEventEnvelope }): Promise<void> {
    const reminderId = readPayloadId(envelope.payload, 'reminderId');
    if (!reminderId) return;
    const reminder = await this.reminderService.findById(reminderId);
    if (reminder?.status !== ReminderStatus.PENDING) return;
    await this.sendReminder.execute(reminderId);
  }
}
