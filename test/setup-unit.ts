// test/setup-unit.ts

/**
 * Jest 单元测试的全局设置
 */

process.env.NODE_ENV = 'test';
process.env.JWT_SECRET = 'test-secret';
// 单测中不启动定时任务与 Outbox 轮询
process.env.SCHEDULER_ENABLED = 'false';
process.env.OUTBOX_ENABLED = 'false';

export {};
