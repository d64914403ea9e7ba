// src/usecases/notification/notification-usecases.module.ts
import { AccountServiceModule } from '@modules/account/account-service.module';
import { CourseServiceModule } from '@modules/course/course-service.module';
import { FinanceServiceModule } from '@modules/finance/finance-service.module';
import { NotificationServiceModule } from '@modules/notification/notification-service.module';
import { StudentServiceModule } from '@modules/student/student-service.module';
import { Module } from '@nestjs/common';
import { DailyNotificationsJob } from './daily-notifications.job';
import { SendBulkNotificationUsecase } from './send-bulk-notification.usecase';

@Module({
  imports: [
    NotificationServiceModule,
    AccountServiceModule,
    CourseServiceModule,
    StudentServiceModule,
    FinanceServiceModule,
  ],
  providers: [SendBulkNotificationUsecase, DailyNotificationsJob],
  exports: [SendBulkNotificationUsecase, DailyNotificationsJob],
})
export class NotificationUsecasesModule {}
