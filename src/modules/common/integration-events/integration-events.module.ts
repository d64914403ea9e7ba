// src/modules/common/integration-events/integration-events.module.ts
import { Module } from '@nestjs/common';
import { OUTBOX_STORE, OUTBOX_WRITER } from './events.tokens';
import { OutboxMemoryService } from './outbox.memory.service';

// 用例模块 import 本模块拿到 OUTBOX_WRITER；调度器与处理器在 adapters/integration-events 装配
@Module({
  providers: [
    OutboxMemoryService,
    { provide: OUTBOX_WRITER, useExisting: OutboxMemoryService },
    { provide: OUTBOX_STORE, useExisting: OutboxMemoryService },
  ],
  exports: [OUTBOX_WRITER, OUTBOX_STORE],
})
export class IntegrationEventsModule {}
