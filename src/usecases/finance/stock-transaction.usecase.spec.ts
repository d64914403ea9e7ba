// src/usecases/finance/stock-transaction.usecase.spec.ts
import { type UsecaseSession } from '@app-types/auth/session.types';
import { StockItemService } from '@modules/finance/stock-item.service';
import { StockTransactionService } from '@modules/finance/stock-transaction.service';
import { Test } from '@nestjs/testing';
import { PinoLogger } from 'nestjs-pino';
import { DataSource } from 'typeorm';
import { StockTransactionUsecase } from './stock-transaction.usecase';

describe('StockTransactionUsecase', () => {
  const manager = { tag: 'tx' };
  const dataSource = { transaction: jest.fn() };
  const transactionService = { create: jest.fn(), getOrThrow: jest.fn(), remove: jest.fn() };
  const itemService = { adjustQuantity: jest.fn() };
  const logger = { setContext: jest.fn(), info: jest.fn() };
  const session: UsecaseSession = { accountId: 3, username: 'store', roles: ['STAFF'] };
  let usecase: StockTransactionUsecase;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        StockTransactionUsecase,
        { provide: DataSource, useValue: dataSource },
        { provide: StockTransactionService, useValue: transactionService },
        { provide: StockItemService, useValue: itemService },
        { provide: PinoLogger, useValue: logger },
      ],
    }).compile();
    usecase = moduleRef.get(StockTransactionUsecase);
    dataSource.transaction.mockImplementation((work: (m: typeof manager) => Promise<unknown>) =>
      work(manager),
    );
  });

  it('在同一事务内调整数量并写入流水', async () => {
    itemService.adjustQuantity.mockResolvedValue({ id: 4, quantityOnHand: '15.00' });
    transactionService.create.mockResolvedValue({ id: 30 });

    await expect(
      usecase.create(session, { itemId: 4, quantityChanged: '5.00', reason: 'purchase' }),
    ).resolves.toEqual({ id: 30 });

    expect(itemService.adjustQuantity).toHaveBeenCalledWith(4, '5.00', manager);
    expect(transactionService.create).toHaveBeenCalledWith(
      { itemId: 4, quantityChanged: '5.00', reason: 'purchase', userId: 3 },
      manager,
    );
  });

  it('删除出库流水时加回数量', async () => {
    const txn = { id: 31, itemId: 4, quantityChanged: '-2.50' };
    transactionService.getOrThrow.mockResolvedValue(txn);

    await usecase.remove(31);

    expect(itemService.adjustQuantity).toHaveBeenCalledWith(4, '2.50', manager);
    expect(transactionService.remove).toHaveBeenCalledWith(txn, manager);
  });
});
