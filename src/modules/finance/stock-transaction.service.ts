// src/modules/finance/stock-transaction.service.ts
import { DomainError, FINANCE_ERROR } from '@core/common/errors/domain-error';
import { columnResolver } from '@core/search/column-map';
import type { SearchParams, SearchResult } from '@core/search/search.types';
import { SearchService } from '@modules/common/search.module';
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { StockTransactionEntity } from './stock-transaction.entity';

/**
 * 库存流水服务（只增删，不修改）
 */
@Injectable()
export class StockTransactionService {
  constructor(
    @InjectRepository(StockTransactionEntity)
    private readonly transactionRepository: Repository<StockTransactionEntity>,
    private readonly searchService: SearchService,
  ) {}

  private repo(manager?: EntityManager): Repository<StockTransactionEntity> {
    return manager ? manager.getRepository(StockTransactionEntity) : this.transactionRepository;
  }

  async getOrThrow(id: number, manager?: EntityManager): Promise<StockTransactionEntity> {
    const transaction = await this.repo(manager).findOne({
      where: { id },
      relations: { item: true, user: true },
    });
    if (!transaction) {
      throw new DomainError(
        FINANCE_ERROR.STOCK_TRANSACTION_NOT_FOUND,
        'Stock transaction not found.',
        { id },
      );
    }
    return transaction;
  }

  async search(params: SearchParams): Promise<SearchResult<StockTransactionEntity>> {
    return this.searchService.search({
      qb: this.transactionRepository
        .createQueryBuilder('txn')
        .leftJoinAndSelect('txn.item', 'item')
        .leftJoinAndSelect('txn.user', 'user'),
      params,
      options: {
        searchColumns: ['item.name', 'txn.reason'],
        allowedFilters: ['itemId'],
        resolveColumn: columnResolver({ itemId: 'txn.itemId', date: 'txn.date', id: 'txn.id' }),
        allowedSorts: ['date', 'id'],
        defaultSorts: [{ field: 'date', direction: 'DESC' }],
      },
    });
  }

  async create(
    data: { itemId: number; quantityChanged: string; reason?: string; userId: number | null },
    manager: EntityManager,
  ): Promise<StockTransactionEntity> {
    const repo = this.repo(manager);
    const saved = await repo.save(
      repo.create({
        itemId: data.itemId,
        quantityChanged: data.quantityChanged,
        reason: data.reason ?? '',
        userId: data.userId,
      }),
    );
    return this.getOrThrow(saved.id, manager);
  }

  async remove(transaction: StockTransactionEntity, manager: EntityManager): Promise<void> {
    await this.repo(manager).remove(transaction);
  }
}
