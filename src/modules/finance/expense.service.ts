// src/modules/finance/expense.service.ts
import { ExpenseCategory } from '@app-types/models/finance.types';
import { DomainError, FINANCE_ERROR } from '@core/common/errors/domain-error';
import { toCents } from '@core/common/numeric/money';
import { columnResolver } from '@core/search/column-map';
import type { SearchParams, SearchResult } from '@core/search/search.types';
import { SearchService } from '@modules/common/search.module';
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { ExpenseEntity } from './expense.entity';

export interface ExpenseData {
  readonly date: string;
  readonly description: string;
  readonly category: ExpenseCategory;
  readonly amount: string;
}

/**
 * 支出服务
 */
@Injectable()
export class ExpenseService {
  constructor(
    @InjectRepository(ExpenseEntity)
    private readonly expenseRepository: Repository<ExpenseEntity>,
    private readonly searchService: SearchService,
  ) {}

  async getOrThrow(id: number): Promise<ExpenseEntity> {
    const expense = await this.expenseRepository.findOne({ where: { id }, relations: { addedBy: true } });
    if (!expense) throw new DomainError(FINANCE_ERROR.EXPENSE_NOT_FOUND, 'Expense not found.', { id });
    return expense;
  }

  async search(params: SearchParams): Promise<SearchResult<ExpenseEntity>> {
    return this.searchService.search({
      qb: this.expenseRepository
        .createQueryBuilder('expense')
        .leftJoinAndSelect('expense.addedBy', 'addedBy'),
      params,
      options: {
        searchColumns: ['expense.description'],
        allowedFilters: ['category', 'date'],
        resolveColumn: columnResolver({
          category: 'expense.category',
          date: 'expense.date',
          amount: 'expense.amount',
        }),
        allowedSorts: ['date', 'amount'],
        defaultSorts: [{ field: 'date', direction: 'DESC' }],
      },
    });
  }

  async create(data: ExpenseData, addedById: number | null): Promise<ExpenseEntity> {
    const saved = await this.expenseRepository.save(
      this.expenseRepository.create({ ...data, addedById }),
    );
    return this.getOrThrow(saved.id);
  }

  async update(id: number, patch: Partial<ExpenseData>): Promise<ExpenseEntity> {
    const expense = await this.getOrThrow(id);
    await this.expenseRepository.save(this.expenseRepository.merge(expense, patch));
    return this.getOrThrow(id);
  }

  async remove(id: number): Promise<void> {
    await this.expenseRepository.remove(await this.getOrThrow(id));
  }

  /** 支出合计（分） */
  async totalCents(): Promise<number> {
    const row = await this.expenseRepository
      .createQueryBuilder('expense')
      .select('SUM(expense.amount)', 'total')
      .getRawOne<{ total: string | number | null }>();
    return toCents(row?.total ?? null);
  }

  /** 按月汇总支出（分），键为 YYYY-MM */
  async monthlyCents(): Promise<Map<string, number>> {
    const rows = await this.expenseRepository
      .createQueryBuilder('expense')
      .select("DATE_FORMAT(expense.date, '%Y-%m')", 'month')
      .addSelect('SUM(expense.amount)', 'total')
      .groupBy('month')
      .getRawMany<{ month: string; total: string | number | null }>();
    return new Map(rows.map((row) => [row.month, toCents(row.total)]));
  }
}
