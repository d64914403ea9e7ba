// src/modules/finance/finance-service.module.ts
import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ExpenseEntity } from './expense.entity';
import { ExpenseService } from './expense.service';
import { FeesReceiptEntity } from './fees-receipt.entity';
import { FeesReceiptService } from './fees-receipt.service';
import { PayrollEntity } from './payroll.entity';
import { PayrollService } from './payroll.service';
import { ReminderEntity } from './reminder.entity';
import { ReminderService } from './reminder.service';
import { StockItemEntity } from './stock-item.entity';
import { StockItemService } from './stock-item.service';
import { StockTransactionEntity } from './stock-transaction.entity';
import { StockTransactionService } from './stock-transaction.service';

const SERVICES = [
  FeesReceiptService,
  ExpenseService,
  PayrollService,
  ReminderService,
  StockItemService,
  StockTransactionService,
];

/**
 * 财务服务模块：收据、支出、工资、提醒、库存
 */
@Module({
  imports: [
    TypeOrmModule.forFeature([
      FeesReceiptEntity,
      ExpenseEntity,
      PayrollEntity,
      ReminderEntity,
      StockItemEntity,
      StockTransactionEntity,
    ]),
  ],
  providers: SERVICES,
  exports: [TypeOrmModule, ...SERVICES],
})
export class FinanceServiceModule {}
