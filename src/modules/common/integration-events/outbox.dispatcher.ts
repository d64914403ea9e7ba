// src/modules/common/integration-events/outbox.dispatcher.ts
import type { IntegrationEventEnvelope } from '@core/common/integration-events/events.types';
import type { IOutboxStorePort } from '@core/common/integration-events/outbox.port';
import { Inject, Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PinoLogger } from 'nestjs-pino';
import { OUTBOX_HANDLERS, OUTBOX_STORE } from './events.tokens';

export interface IntegrationEventHandler {
  readonly type: IntegrationEventEnvelope['type'];
  handle(input: { readonly envelope: IntegrationEventEnvelope }): Promise<void>;
}

interface OutboxSettings {
  readonly enabled: boolean;
  readonly intervalMs: number;
  readonly batchSize: number;
  readonly maxAttempts: number;
  readonly backoff: ReadonlyArray<number>;
}

const DEFAULT_SETTINGS: OutboxSettings = {
  enabled: true,
  intervalMs: 1000,
  batchSize: 100,
  maxAttempts: 5,
  backoff: [1000, 5000, 30000, 120000, 600000],
};

/**
 * 轮询内存 Outbox，把事件交给同类型的处理器
 * 同一事件的多个处理器串行执行，任一失败整条事件重试，因此处理器必须幂等
 */
@Injectable()
export class OutboxDispatcher implements OnModuleInit, OnModuleDestroy {
  private readonly settings: OutboxSettings;
  private timer: NodeJS.Timeout | null = null;
  private ticking = false;
  private running = false;

  constructor(
    config: ConfigService,
    @Inject(OUTBOX_STORE) private readonly store: IOutboxStorePort,
    @Inject(OUTBOX_HANDLERS) private readonly handlers: ReadonlyArray<IntegrationEventHandler>,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(OutboxDispatcher.name);
    this.settings = { ...DEFAULT_SETTINGS, ...config.get<Partial<OutboxSettings>>('outbox') };
  }

  onModuleInit(): void {
    if (!this.settings.enabled) return;
    this.running = true;
    this.schedule();
  }

  onModuleDestroy(): void {
    this.running = false;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
  }

  /** 立即处理一批到期事件 */
  async drain(): Promise<void> {
    if (this.ticking) return;
    this.ticking = true;
    try {
      for (const item of this.store.pullReady(this.settings.batchSize)) {
        await this.dispatch(item.envelope, item.attempts);
      }
    } finally {
      this.ticking = false;
      this.schedule();
    }
  }

  private async dispatch(envelope: IntegrationEventEnvelope, attempts: number): Promise<void> {
    for (const handler of this.handlers) {
      if (handler.type !== envelope.type) continue;
      try {
        await handler.handle({ envelope });
      } catch (error) {
        const { backoff, maxAttempts } = this.settings;
        const backoffMs = backoff[Math.min(attempts, backoff.length - 1)];
        this.logger.warn(
          {
            type: envelope.type,
            aggregateId: envelope.aggregateId,
            attempts: attempts + 1,
            backoffMs,
            error: error instanceof Error ? error.message : String(error),
          },
          '事件处理失败，稍后重试',
        );
        this.store.scheduleRetry(envelope, backoffMs, maxAttempts);
        return;
      }
    }
    this.store.markSucceeded(envelope);
  }

  private schedule(): void {
    if (!this.running) return;
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.drain().catch((error: unknown) => {
        this.logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Outbox 轮询异常');
      });
    }, this.settings.intervalMs);
  }
}
