// src/modules/common/integration-events/events.tokens.ts
// Outbox 写端口与存储端口共用 OutboxMemoryService 实例
export const OUTBOX_WRITER = Symbol('OUTBOX_WRITER');
export const OUTBOX_STORE = Symbol('OUTBOX_STORE');
export const OUTBOX_HANDLERS = Symbol('OUTBOX_HANDLERS');
