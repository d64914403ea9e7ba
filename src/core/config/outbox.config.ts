// src/core/config/outbox.config.ts
// 出站事件（考勤通知、收据邮件、证书 PDF 等）投递配置

const parseBackoff = (raw: string | undefined): number[] => {
  const series = (raw ?? '')
    .split(',')
    .map((v) => parseInt(v.trim(), 10))
    .filter((v) => Number.isFinite(v) && v > 0);
  return series.length > 0 ? series : [1000, 5000, 30000, 120000, 600000];
};

const outboxConfig = () => ({
  outbox: {
    enabled: process.env.OUTBOX_ENABLED !== 'false',
    intervalMs: parseInt(process.env.OUTBOX_DISPATCH_INTERVAL_MS || '1000', 10),
    batchSize: parseInt(process.env.OUTBOX_BATCH_SIZE || '100', 10),
    maxAttempts: parseInt(process.env.OUTBOX_MAX_ATTEMPTS || '5', 10),
    // 第 n 次失败后等待 backoff[n]，超出长度取最后一项
    backoff: parseBackoff(process.env.OUTBOX_BACKOFF_SERIES),
  },
});

export default outboxConfig;
