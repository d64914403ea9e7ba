// src/adapters/integration-events/integration-events-adapter.module.ts
import { Module } from '@nestjs/common';
import { IntegrationEventsModule } from '@src/modules/common/integration-events/integration-events.module';
import { OUTBOX_HANDLERS } from '@src/modules/common/integration-events/events.tokens';
import {
  OutboxDispatcher,
  type IntegrationEventHandler,
} from '@src/modules/common/integration-events/outbox.dispatcher';
import { AttendanceRecordedHandler } from '@src/usecases/attendance/attendance-recorded.handler';
import { AttendanceUsecasesModule } from '@src/usecases/attendance/attendance-usecases.module';
import { CertificateIssuedHandler } from '@src/usecases/certificate/certificate-issued.handler';
import { CertificateUsecasesModule } from '@src/usecases/certificate/certificate-usecases.module';
import { FeeReminderCreatedHandler } from '@src/usecases/finance/fee-reminder-created.handler';
import { FeesReceiptSavedHandler } from '@src/usecases/finance/fees-receipt-saved.handler';
import { FinanceUsecasesModule } from '@src/usecases/finance/finance-usecases.module';

/**
 * 事件处理器装配：收集各用例模块导出的处理器交给 Outbox 调度器
 */
@Module({
  imports: [
    IntegrationEventsModule,
    AttendanceUsecasesModule,
    FinanceUsecasesModule,
    CertificateUsecasesModule,
  ],
  providers: [
    {
      provide: OUTBOX_HANDLERS,
      useFactory: (
        attendanceRecorded: AttendanceRecordedHandler,
        receiptSaved: FeesReceiptSavedHandler,
        reminderCreated: FeeReminderCreatedHandler,
        certificateIssued: CertificateIssuedHandler,
      ): ReadonlyArray<IntegrationEventHandler> => [
        attendanceRecorded,
        receiptSaved,
        reminderCreated,
        certificateIssued,
      ],
      inject: [
        AttendanceRecordedHandler,
        FeesReceiptSavedHandler,
        FeeReminderCreatedHandler,
        CertificateIssuedHandler,
      ],
    },
    OutboxDispatcher,
  ],
})
export class IntegrationEventsAdapterModule {}
