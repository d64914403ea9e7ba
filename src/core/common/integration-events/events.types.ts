// src/core/common/integration-events/events.types.ts
/**
 * 业务写入后需要异步处理的副作用
 * - AttendanceRecorded：出勤天数达标的报名自动标记为 completed
 * - FeesReceiptSaved：仍有欠费时生成待发送的缴费提醒
 * - FeeReminderCreated：发送提醒邮件
 * - CertificateIssued：生成证书 PDF
 */
export type IntegrationEventType =
  | 'AttendanceRecorded'
  | 'FeesReceiptSaved'
  | 'CertificateIssued'
  | 'FeeReminderCreated';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue =
  | JsonPrimitive
  | { readonly [k: string]: JsonValue }
  | ReadonlyArray<JsonValue>;

export type EventPayload = Readonly<Record<string, JsonValue>>;

export interface IntegrationEventEnvelope<T extends IntegrationEventType = IntegrationEventType> {
  readonly type: T;
  /** 聚合名，如 Attendance / FeesReceipt */
  readonly aggregateType: string;
  readonly aggregateId: number | string;
  readonly schemaVersion: number;
  readonly payload: EventPayload;
  /** 默认 `${type}:${aggregateId}:${schemaVersion}`；未投递前同键的新事件覆盖旧事件 */
  readonly dedupKey: string;
  /** ISO 8601 */
  readonly occurredAt: string;
}

export function buildEnvelope(input: {
  readonly type: IntegrationEventType;
  readonly aggregateType: string;
  readonly aggregateId: number | string;
  readonly schemaVersion?: number;
  readonly payload?: EventPayload;
  readonly dedupKey?: string;
  readonly occurredAt?: Date;
}): IntegrationEventEnvelope {
  const schemaVersion = input.schemaVersion ?? 1;
  return {
    type: input.type,
    aggregateType: input.aggregateType,
    aggregateId: input.aggregateId,
    schemaVersion,
    payload: input.payload ?? {},
    dedupKey: input.dedupKey ?? `${input.type}:${input.aggregateId}:${schemaVersion}`,
    occurredAt: (input.occurredAt ?? new Date()).toISOString(),
  };
}

/**
 * 从载荷中读取正整数，缺失或非法时返回 null
 */
export function readPayloadId(
  payload: EventPayload,
  key: string,
): number | null {
  const raw = payload[key];
  const n = typeof raw === 'number' ? raw : typeof raw === 'string' ? Number(raw) : NaN;
  return Number.isInteger(n) && n > 0 ? n : null;
}

/**
 * 从载荷中读取正整数数组，忽略非法项
 */
export function readPayloadIds(
  payload: EventPayload,
  key: string,
): number[] {
  const raw = payload[key];
  if (!Array.isArray(raw)) return [];
  const ids: number[] = [];
  for (const item of raw) {
    if (typeof item === 'number' && Number.isInteger(item) && item > 0) ids.push(item);
  }
  return ids;
}
