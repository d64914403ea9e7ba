// src/usecases/finance/finance-usecases.module.ts
import { IntegrationEventsModule } from '@modules/common/integration-events/integration-events.module';
import { CourseServiceModule } from '@modules/course/course-service.module';
import { FinanceServiceModule } from '@modules/finance/finance-service.module';
import { StudentServiceModule } from '@modules/student/student-service.module';
import { Module } from '@nestjs/common';
import { CheckOverdueFeesJob } from './check-overdue-fees.job';
import { FeeReminderCreatedHandler } from './fee-reminder-created.handler';
import { FeesReceiptSavedHandler } from './fees-receipt-saved.handler';
import { FinanceAnalyticsUsecase } from './finance-analytics.usecase';
import { OutstandingUsecase } from './outstanding.usecase';
import { OverdueReminderRule } from './overdue-reminder.rule';
import { ReceiptPdfUsecase } from './receipt-pdf.usecase';
import { SavePayrollUsecase } from './save-payroll.usecase';
import { SaveReceiptUsecase } from './save-receipt.usecase';
import { SendReminderUsecase } from './send-reminder.usecase';
import { StockTransactionUsecase } from './stock-transaction.usecase';

const USECASES = [
  SaveReceiptUsecase,
  ReceiptPdfUsecase,
  SavePayrollUsecase,
  StockTransactionUsecase,
  SendReminderUsecase,
  FinanceAnalyticsUsecase,
  OutstandingUsecase,
  CheckOverdueFeesJob,
  FeesReceiptSavedHandler,
  FeeReminderCreatedHandler,
];

@Module({
  imports: [FinanceServiceModule, CourseServiceModule, StudentServiceModule, IntegrationEventsModule],
  providers: [OverdueReminderRule, ...USECASES],
  exports: USECASES,
})
export class FinanceUsecasesModule {}
