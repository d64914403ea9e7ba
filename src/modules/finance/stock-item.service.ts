// src/modules/finance/stock-item.service.ts
import { DomainError, FINANCE_ERROR } from '@core/common/errors/domain-error';
import { formatCents, toCents } from '@core/common/numeric/money';
import { isUniqueConstraintViolation } from '@core/database/unique-violation';
import { columnResolver } from '@core/search/column-map';
import type { SearchParams, SearchResult } from '@core/search/search.types';
import { SearchService } from '@modules/common/search.module';
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { StockItemEntity } from './stock-item.entity';

export interface StockItemData {
  readonly name: string;
  readonly description?: string | null;
  readonly unitOfMeasure?: string;
  readonly quantityOnHand?: string;
  readonly reorderLevel?: string;
}

/**
 * 库存物料服务
 */
@Injectable()
export class StockItemService {
  constructor(
    @InjectRepository(StockItemEntity)
    private readonly itemRepository: Repository<StockItemEntity>,
    private readonly searchService: SearchService,
  ) {}

  private repo(manager?: EntityManager): Repository<StockItemEntity> {
    return manager ? manager.getRepository(StockItemEntity) : this.itemRepository;
  }

  async getOrThrow(id: number, manager?: EntityManager): Promise<StockItemEntity> {
    const item = await this.repo(manager).findOne({ where: { id } });
    if (!item) throw new DomainError(FINANCE_ERROR.STOCK_ITEM_NOT_FOUND, 'Stock item not found.', { id });
    return item;
  }

  async search(params: SearchParams): Promise<SearchResult<StockItemEntity>> {
    return this.searchService.search({
      qb: this.itemRepository.createQueryBuilder('item'),
      params,
      options: {
        searchColumns: ['item.name', 'item.description'],
        allowedFilters: ['needsReorder'],
        resolveColumn: columnResolver({ name: 'item.name', needsReorder: 'item.quantityOnHand' }),
        // needsReorder 为计算字段：现有量 ≤ 补货阈值
        buildFilter: ({ field, value }) => {
          if (field !== 'needsReorder') return null;
          return {
            clause:
              value === true
                ? 'item.quantityOnHand <= item.reorderLevel'
                : 'item.quantityOnHand > item.reorderLevel',
          };
        },
        allowedSorts: ['name'],
        defaultSorts: [{ field: 'name', direction: 'ASC' }],
      },
    });
  }

  async create(data: StockItemData): Promise<StockItemEntity> {
    return this.persist(
      this.itemRepository.create({
        name: data.name.trim(),
        description: data.description ?? null,
        unitOfMeasure: data.unitOfMeasure ?? 'pcs',
        quantityOnHand: data.quantityOnHand ?? '0.00',
        reorderLevel: data.reorderLevel ?? '0.00',
      }),
    );
  }

  async update(id: number, patch: Partial<StockItemData>): Promise<StockItemEntity> {
    const item = await this.getOrThrow(id);
    return this.persist(this.itemRepository.merge(item, patch));
  }

  async remove(id: number): Promise<void> {
    await this.itemRepository.remove(await this.getOrThrow(id));
  }

  /**
   * 调整现有数量（加行锁），delta 为带符号数量文本
   */
  async adjustQuantity(itemId: number, delta: string, manager: EntityManager): Promise<StockItemEntity> {
    const repo = this.repo(manager);
    const item = await repo.findOne({ where: { id: itemId }, lock: { mode: 'pessimistic_write' } });
    if (!item) {
      throw new DomainError(FINANCE_ERROR.STOCK_ITEM_NOT_FOUND, 'Stock item not found.', { id: itemId });
    }
    item.quantityOnHand = formatCents(toCents(item.quantityOnHand) + toCents(delta));
    return repo.save(item);
  }

  private async persist(item: StockItemEntity): Promise<StockItemEntity> {
    try {
      return await this.itemRepository.save(item);
    } catch (error) {
      if (isUniqueConstraintViolation(error)) {
        throw new DomainError(
          FINANCE_ERROR.STOCK_ITEM_ALREADY_EXISTS,
          'Stock item with this name already exists.',
          { name: item.name },
          error,
        );
      }
      throw error;
    }
  }
}
