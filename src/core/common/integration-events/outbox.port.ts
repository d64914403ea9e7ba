// src/core/common/integration-events/outbox.port.ts
import type { IntegrationEventEnvelope } from './events.types';

/**
 * 写入事件时所在的数据库事务
 * 核心层只持有不透明引用，具体类型（EntityManager）由实现方解释
 */
export interface OutboxTx {
  readonly kind: 'tx';
  readonly opaque?: unknown;
}

/** 用例侧：考勤、收据、证书等写入成功后登记后续副作用 */
export interface IOutboxWriterPort {
  enqueue(input: { readonly tx?: OutboxTx; readonly envelope: IntegrationEventEnvelope }): Promise<void>;
}

/** 调度器侧 */
export interface IOutboxStorePort {
  /** 到期事件，按入队顺序；取出后标记为处理中，直到 markSucceeded / scheduleRetry */
  pullReady(maxCount: number): ReadonlyArray<OutboxReadyItem>;
  markSucceeded(envelope: IntegrationEventEnvelope): void;
  /** 超过 maxAttempts 后转入死信 */
  scheduleRetry(envelope: IntegrationEventEnvelope, backoffMs: number, maxAttempts: number): void;
  counts(): OutboxCounts;
}

export interface OutboxReadyItem {
  readonly envelope: IntegrationEventEnvelope;
  readonly attempts: number;
}

export interface OutboxCounts {
  readonly pending: number;
  readonly deadLettered: number;
}
