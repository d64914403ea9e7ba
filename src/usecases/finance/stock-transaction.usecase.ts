// src/usecases/finance/stock-transaction.usecase.ts
import { type UsecaseSession } from '@app-types/auth/session.types';
import { formatCents, toCents } from '@core/common/numeric/money';
import { StockItemService } from '@modules/finance/stock-item.service';
import { StockTransactionEntity } from '@modules/finance/stock-transaction.entity';
import { StockTransactionService } from '@modules/finance/stock-transaction.service';
import { Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';
import { DataSource } from 'typeorm';

export interface StockTransactionInput {
  readonly itemId: number;
  /** 带符号数量，入库为正、出库为负 */
  readonly quantityChanged: string;
  readonly reason?: string;
}

/**
 * 库存流水：写入流水与调整现有量在同一事务内完成
 */
@Injectable()
export class StockTransactionUsecase {
  constructor(
    private readonly dataSource: DataSource,
    private readonly transactionService: StockTransactionService,
    private readonly itemService: StockItemService,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(StockTransactionUsecase.name);
  }

  async create(session: UsecaseSession, input: StockTransactionInput): Promise<StockTransactionEntity> {
    return this.dataSource.transaction(async (manager) => {
      const item = await this.itemService.adjustQuantity(input.itemId, input.quantityChanged, manager);
      const txn = await this.transactionService.create(
        {
          itemId: item.id,
          quantityChanged: input.quantityChanged,
          reason: input.reason,
          userId: session.accountId,
        },
        manager,
      );
      this.logger.info(
        { itemId: item.id, delta: input.quantityChanged, quantityOnHand: item.quantityOnHand },
        '库存已调整',
      );
      return txn;
    });
  }

  /** 删除流水并回滚其数量 */
  async remove(id: number): Promise<void> {
    await this.dataSource.transaction(async (manager) => {
      const txn = await this.transactionService.getOrThrow(id, manager);
      const reverse = formatCents(-toCents(txn.quantityChanged));
      await this.itemService.adjustQuantity(txn.itemId, reverse, manager);
      await this.transactionService.remove(txn, manager);
    });
    this.logger.info({ transactionId: id }, '库存流水已删除并回滚');
  }
}
