// src/modules/common/integration-events/outbox.dispatcher.spec.ts
import { buildEnvelope } from '@core/common/integration-events/events.types';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { PinoLogger } from 'nestjs-pino';
import { OUTBOX_HANDLERS, OUTBOX_STORE } from './events.tokens';
import { IntegrationEventHandler, OutboxDispatcher } from './outbox.dispatcher';
import { OutboxMemoryService } from './outbox.memory.service';

describe('OutboxDispatcher', () => {
  const logger = {
    setContext: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };

  const makeDispatcher = async (
    store: OutboxMemoryService,
    handlers: IntegrationEventHandler[],
    outbox: Record<string, unknown> = {},
  ): Promise<OutboxDispatcher> => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        OutboxDispatcher,
        // 关闭轮询，只通过 drain() 驱动
        { provide: ConfigService, useValue: new ConfigService({ outbox: { enabled: false, ...outbox } }) },
        { provide: OUTBOX_STORE, useValue: store },
        { provide: OUTBOX_HANDLERS, useValue: handlers },
        { provide: PinoLogger, useValue: logger },
      ],
    }).compile();
    return moduleRef.get(OutboxDispatcher);
  };

  it('按类型分发，成功后出队', async () => {
    const store = new OutboxMemoryService();
    const handle = jest.fn().mockResolvedValue(undefined);
    const other = jest.fn().mockResolvedValue(undefined);
    const dispatcher = await makeDispatcher(store, [
      { type: 'AttendanceRecorded', handle },
      { type: 'CertificateIssued', handle: other },
    ]);
    const envelope = buildEnvelope({
      type: 'AttendanceRecorded',
      aggregateType: 'Attendance',
      aggregateId: 1,
      payload: { batchId: 2 },
    });
    await store.enqueue({ envelope });

    await dispatcher.drain();

    expect(handle).toHaveBeenCalledWith({ envelope });
    expect(other).not.toHaveBeenCalled();
    expect(store.counts()).toEqual({ pending: 0, deadLettered: 0 });
  });

  it('没有处理器的事件直接出队', async () => {
    const store = new OutboxMemoryService();
    const dispatcher = await makeDispatcher(store, []);
    await store.enqueue({
      envelope: buildEnvelope({ type: 'CertificateIssued', aggregateType: 'Certificate', aggregateId: 3 }),
    });

    await dispatcher.drain();

    expect(store.counts()).toEqual({ pending: 0, deadLettered: 0 });
  });

  it('失败时按退避序列记录日志，未达上限留在队列中', async () => {
    const store = new OutboxMemoryService();
    const handle = jest.fn().mockRejectedValue(new Error('smtp down'));
    const dispatcher = await makeDispatcher(store, [{ type: 'FeeReminderCreated', handle }], {
      backoff: [2000, 9000],
    });
    await store.enqueue({
      envelope: buildEnvelope({ type: 'FeeReminderCreated', aggregateType: 'Reminder', aggregateId: 8 }),
    });

    await dispatcher.drain();

    expect(logger.warn).toHaveBeenCalledWith(
      { type: 'FeeReminderCreated', aggregateId: 8, attempts: 1, backoffMs: 2000, error: 'smtp down' },
      '事件处理失败，稍后重试',
    );
    expect(store.counts()).toEqual({ pending: 1, deadLettered: 0 });
    // 退避期内不会再次取出
    expect(store.pullReady(10)).toEqual([]);
  });

  it('达到最大次数后转入死信', async () => {
    const store = new OutboxMemoryService();
    const handle = jest.fn().mockRejectedValue(new Error('smtp down'));
    const dispatcher = await makeDispatcher(store, [{ type: 'FeeReminderCreated', handle }], {
      maxAttempts: 1,
    });
    await store.enqueue({
      envelope: buildEnvelope({ type: 'FeeReminderCreated', aggregateType: 'Reminder', aggregateId: 8 }),
    });

    await dispatcher.drain();

    expect(store.counts()).toEqual({ pending: 0, deadLettered: 1 });
  });

  it('投递前再次保存同一考勤，以最新载荷为准', async () => {
    const store = new OutboxMemoryService();
    const handle = jest.fn().mockResolvedValue(undefined);
    const dispatcher = await makeDispatcher(store, [{ type: 'AttendanceRecorded', handle }]);
    const saved = (payload: { attendanceId: number; batchId: number; studentIds: number[] }) =>
      buildEnvelope({ type: 'AttendanceRecorded', aggregateType: 'Attendance', aggregateId: 5, payload });
    const first = saved({ attendanceId: 5, batchId: 1, studentIds: [1, 2] });
    const second = saved({ attendanceId: 5, batchId: 2, studentIds: [3] });
    await store.enqueue({ envelope: first });
    await store.enqueue({ envelope: second });

    expect(store.counts()).toEqual({ pending: 1, deadLettered: 0 });

    await dispatcher.drain();

    expect(handle).toHaveBeenCalledTimes(1);
    expect(handle).toHaveBeenCalledWith({ envelope: second });
    expect(store.counts()).toEqual({ pending: 0, deadLettered: 0 });
  });

  it('事件处理中再次保存，新载荷另行入队', async () => {
    const store = new OutboxMemoryService();
    const env = (amount: string) =>
      buildEnvelope({
        type: 'FeesReceiptSaved',
        aggregateType: 'FeesReceipt',
        aggregateId: 5,
        payload: { receiptId: 5, amount },
      });
    const first = env('100.00');
    const second = env('250.00');
    await store.enqueue({ envelope: first });

    expect(store.pullReady(10)).toEqual([{ envelope: first, attempts: 0 }]);
    await store.enqueue({ envelope: second });
    expect(store.pullReady(10)).toEqual([{ envelope: second, attempts: 0 }]);

    store.markSucceeded(first);
    expect(store.counts()).toEqual({ pending: 1, deadLettered: 0 });
  });
});
