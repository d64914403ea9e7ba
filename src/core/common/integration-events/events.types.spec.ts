// src/core/common/integration-events/events.types.spec.ts
import { buildEnvelope, readPayloadId, readPayloadIds } from './events.types';

describe('buildEnvelope', () => {
  it('默认 schemaVersion 为 1，dedupKey 由类型与聚合 id 组成', () => {
    const env = buildEnvelope({
      type: 'AttendanceRecorded',
      aggregateType: 'Attendance',
      aggregateId: 123,
    });
    expect(env.type).toBe('AttendanceRecorded');
    expect(env.aggregateType).toBe('Attendance');
    expect(env.aggregateId).toBe(123);
    expect(env.schemaVersion).toBe(1);
    expect(env.payload).toEqual({});
    expect(typeof env.occurredAt).toBe('string');
    expect(env.dedupKey).toBe('AttendanceRecorded:123:1');
  });

  it('schemaVersion 参与 dedupKey', () => {
    const env = buildEnvelope({
      type: 'FeesReceiptSaved',
      aggregateType: 'FeesReceipt',
      aggregateId: 'r-9',
      schemaVersion: 2,
      payload: { receiptId: 9 },
    });
    expect(env.schemaVersion).toBe(2);
    expect(env.payload).toEqual({ receiptId: 9 });
    expect(env.dedupKey).toBe('FeesReceiptSaved:r-9:2');
  });

  it('允许定制 dedupKey 与 occurredAt', () => {
    const env = buildEnvelope({
      type: 'CertificateIssued',
      aggregateType: 'Certificate',
      aggregateId: 99,
      dedupKey: 'custom-key',
      occurredAt: new Date('2023-05-06T12:34:56.000Z'),
    });
    expect(env.dedupKey).toBe('custom-key');
    expect(env.occurredAt).toBe('2023-05-06T12:34:56.000Z');
  });
});

describe('payload 读取', () => {
  const payload = { batchId: 7, studentIds: [1, 'x', 2.5, 3, -1], raw: '12', bad: 'abc' };

  it('readPayloadId 接受数字与数字字符串', () => {
    expect(readPayloadId(payload, 'batchId')).toBe(7);
    expect(readPayloadId(payload, 'raw')).toBe(12);
    expect(readPayloadId(payload, 'bad')).toBeNull();
    expect(readPayloadId(payload, 'missing')).toBeNull();
  });

  it('readPayloadIds 只保留正整数', () => {
    expect(readPayloadIds(payload, 'studentIds')).toEqual([1, 3]);
    expect(readPayloadIds(payload, 'batchId')).toEqual([]);
  });
});
