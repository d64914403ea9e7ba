// src/core/config/scheduler.config.ts
// 每日任务调度配置（HH:mm，服务器本地时区）

const schedulerConfig = () => ({
  scheduler: {
    enabled: process.env.SCHEDULER_ENABLED !== 'false',
    overdueFeesAt: process.env.SCHEDULER_OVERDUE_FEES_AT || '09:00',
    dailyNotificationsAt: process.env.SCHEDULER_DAILY_NOTIFICATIONS_AT || '10:00',
  },
});

export default schedulerConfig;
