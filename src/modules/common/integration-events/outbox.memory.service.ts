// src/modules/common/integration-events/outbox.memory.service.ts
import type { IntegrationEventEnvelope } from '@core/common/integration-events/events.types';
import type {
  IOutboxStorePort,
  IOutboxWriterPort,
  OutboxCounts,
  OutboxReadyItem,
  OutboxTx,
} from '@core/common/integration-events/outbox.port';
import { Injectable } from '@nestjs/common';

interface PendingEvent {
  envelope: IntegrationEventEnvelope;
  attempts: number;
  dueAt: number;
  /** 已被调度器取出、尚未回报结果 */
  inFlight: boolean;
}

/**
 * 进程内 Outbox，同时充当写端口与存储端口
 * tx 不参与持久化，进程重启后未投递的邮件/通知会丢失
 */
@Injectable()
export class OutboxMemoryService implements IOutboxWriterPort, IOutboxStorePort {
  private readonly pending: PendingEvent[] = [];
  private readonly deadLetters: PendingEvent[] = [];

  /**
   * 同一 dedupKey 尚未被取出时，以最新一次写入的载荷覆盖旧载荷
   * 已取出的事件不受影响，新载荷另行入队
   */
  async enqueue(input: { readonly tx?: OutboxTx; readonly envelope: IntegrationEventEnvelope }): Promise<void> {
    await Promise.resolve();
    const { envelope } = input;
    const now = Date.now();
    const waiting = this.pending.find((p) => !p.inFlight && p.envelope.dedupKey === envelope.dedupKey);
    if (waiting) {
      waiting.envelope = envelope;
      waiting.attempts = 0;
      waiting.dueAt = now;
      return;
    }
    this.pending.push({ envelope, attempts: 0, dueAt: now, inFlight: false });
  }

  pullReady(maxCount: number): ReadonlyArray<OutboxReadyItem> {
    const now = Date.now();
    const ready: OutboxReadyItem[] = [];
    for (const item of this.pending) {
      if (ready.length >= maxCount) break;
      if (item.inFlight || item.dueAt > now) continue;
      item.inFlight = true;
      ready.push({ envelope: item.envelope, attempts: item.attempts });
    }
    return ready;
  }

  markSucceeded(envelope: IntegrationEventEnvelope): void {
    this.release(envelope);
  }

  scheduleRetry(envelope: IntegrationEventEnvelope, backoffMs: number, maxAttempts: number): void {
    const item = this.pending.find((p) => p.envelope === envelope);
    if (!item) return;
    item.inFlight = false;
    item.attempts += 1;
    if (item.attempts >= maxAttempts) {
      this.deadLetters.push(item);
      this.release(envelope);
    } else {
      item.dueAt = Date.now() + backoffMs;
    }
  }

  counts(): OutboxCounts {
    return { pending: this.pending.length, deadLettered: this.deadLetters.length };
  }

  private release(envelope: IntegrationEventEnvelope): void {
    const idx = this.pending.findIndex((p) => p.envelope === envelope);
    if (idx >= 0) this.pending.splice(idx, 1);
  }
}
