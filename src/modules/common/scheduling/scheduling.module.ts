// src/modules/common/scheduling/scheduling.module.ts
import { Module } from '@nestjs/common';
import { CheckOverdueFeesJob } from '@usecases/finance/check-overdue-fees.job';
import { FinanceUsecasesModule } from '@usecases/finance/finance-usecases.module';
import { DailyNotificationsJob } from '@usecases/notification/daily-notifications.job';
import { NotificationUsecasesModule } from '@usecases/notification/notification-usecases.module';
import { DAILY_JOBS, DailyJobScheduler, type DailyJob } from './daily-job.scheduler';

/**
 * 每日任务：09:00 逾期缴费检查，10:00 站内通知
 */
@Module({
  imports: [FinanceUsecasesModule, NotificationUsecasesModule],
  providers: [
    {
      provide: DAILY_JOBS,
      useFactory: (
        overdueFees: CheckOverdueFeesJob,
        notifications: DailyNotificationsJob,
      ): ReadonlyArray<DailyJob> => [overdueFees, notifications],
      inject: [CheckOverdueFeesJob, DailyNotificationsJob],
    },
    DailyJobScheduler,
  ],
})
export class SchedulingModule {}
