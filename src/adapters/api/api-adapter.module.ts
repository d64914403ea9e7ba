// src/adapters/api/api-adapter.module.ts
import { AccountServiceModule } from '@modules/account/account-service.module';
import { AttendanceServiceModule } from '@modules/attendance/attendance-service.module';
import { AuditModule } from '@modules/audit/audit.module';
import { AuthModule } from '@modules/auth/auth.module';
import { CertificateServiceModule } from '@modules/certificate/certificate-service.module';
import { CourseServiceModule } from '@modules/course/course-service.module';
import { EventServiceModule } from '@modules/event/event-service.module';
import { FinanceServiceModule } from '@modules/finance/finance-service.module';
import { NotificationServiceModule } from '@modules/notification/notification-service.module';
import { StudentServiceModule } from '@modules/student/student-service.module';
import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { AccountUsecasesModule } from '@usecases/account/account-usecases.module';
import { AttendanceUsecasesModule } from '@usecases/attendance/attendance-usecases.module';
import { AuthUsecasesModule } from '@usecases/auth/auth-usecases.module';
import { CertificateUsecasesModule } from '@usecases/certificate/certificate-usecases.module';
import { CourseUsecasesModule } from '@usecases/course/course-usecases.module';
import { EventUsecasesModule } from '@usecases/event/event-usecases.module';
import { FinanceUsecasesModule } from '@usecases/finance/finance-usecases.module';
import { MessagingUsecasesModule } from '@usecases/messaging/messaging-usecases.module';
import { NotificationUsecasesModule } from '@usecases/notification/notification-usecases.module';
import { StudentUsecasesModule } from '@usecases/student/student-usecases.module';
import { HistoryController } from './account/history.controller';
import { RolesController } from './account/roles.controller';
import { UsersController } from './account/users.controller';
import { AttendanceController } from './attendance/attendance.controller';
import { AuthController } from './auth/auth.controller';
import { CertificatesController, MyCertificatesController } from './certificate/certificates.controller';
import { BatchesController } from './course/batches.controller';
import { CoursesController } from './course/courses.controller';
import { EnrollmentsController } from './course/enrollments.controller';
import { TrainersController } from './course/trainers.controller';
import { EventsController } from './event/events.controller';
import { ExpensesController } from './finance/expenses.controller';
import {
  FinanceAnalyticsController,
  FinanceJobsController,
  OutstandingController,
} from './finance/finance-reports.controller';
import { PayrollController } from './finance/payroll.controller';
import { MyReceiptsController, ReceiptsController } from './finance/receipts.controller';
import { RemindersController } from './finance/reminders.controller';
import { StockItemsController, StockTransactionsController } from './finance/stock.controller';
import { JwtAuthGuard } from './guards/jwt-auth.guard';
import { RolesGuard } from './guards/roles.guard';
import { HealthController } from './health/health.controller';
import { ConversationsController } from './messaging/conversations.controller';
import { NotificationsController } from './notification/notifications.controller';
import { EnquiriesController } from './student/enquiries.controller';
import { MeasurementsController } from './student/measurements.controller';
import { StudentsController } from './student/students.controller';

/**
 * REST 适配层
 * 全局守卫顺序：先认证（@Public 放行），再按 @Roles 校验角色
 */
@Module({
  imports: [
    AuthModule,
    AuditModule,
    AccountServiceModule,
    StudentServiceModule,
    CourseServiceModule,
    AttendanceServiceModule,
    FinanceServiceModule,
    CertificateServiceModule,
    EventServiceModule,
    NotificationServiceModule,
    AuthUsecasesModule,
    AccountUsecasesModule,
    StudentUsecasesModule,
    CourseUsecasesModule,
    AttendanceUsecasesModule,
    FinanceUsecasesModule,
    CertificateUsecasesModule,
    MessagingUsecasesModule,
    EventUsecasesModule,
    NotificationUsecasesModule,
  ],
  controllers: [
    HealthController,
    AuthController,
    UsersController,
    RolesController,
    HistoryController,
    StudentsController,
    EnquiriesController,
    MeasurementsController,
    CoursesController,
    TrainersController,
    BatchesController,
    EnrollmentsController,
    AttendanceController,
    ReceiptsController,
    MyReceiptsController,
    ExpensesController,
    PayrollController,
    RemindersController,
    StockItemsController,
    StockTransactionsController,
    FinanceAnalyticsController,
    OutstandingController,
    FinanceJobsController,
    CertificatesController,
    MyCertificatesController,
    ConversationsController,
    EventsController,
    NotificationsController,
  ],
  providers: [
    { provide: APP_GUARD, useClass: JwtAuthGuard },
    { provide: APP_GUARD, useClass: RolesGuard },
  ],
})
export class ApiAdapterModule {}
