// src/modules/finance/payroll.service.ts
import { DEFAULT_PAYROLL_STATUS, PayrollBreakdown } from '@app-types/models/finance.types';
import { DomainError, FINANCE_ERROR } from '@core/common/errors/domain-error';
import { toCents } from '@core/common/numeric/money';
import { isUniqueConstraintViolation } from '@core/database/unique-violation';
import { columnResolver } from '@core/search/column-map';
import type { SearchParams, SearchResult } from '@core/search/search.types';
import { SearchService } from '@modules/common/search.module';
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { PayrollEntity } from './payroll.entity';

export interface PayrollData {
  readonly month: string;
  readonly trainerId: number;
  readonly earnings?: PayrollBreakdown;
  readonly deductions?: PayrollBreakdown;
  readonly netPay: string;
  readonly status?: string;
}

const PAYROLL_RELATIONS = { trainer: { user: true } } as const;

/**
 * 工资单服务
 * 同一讲师同一月份只能有一条
 */
@Injectable()
export class PayrollService {
  constructor(
    @InjectRepository(PayrollEntity)
    private readonly payrollRepository: Repository<PayrollEntity>,
    private readonly searchService: SearchService,
  ) {}

  async getOrThrow(id: number): Promise<PayrollEntity> {
    const payroll = await this.payrollRepository.findOne({ where: { id }, relations: PAYROLL_RELATIONS });
    if (!payroll) throw new DomainError(FINANCE_ERROR.PAYROLL_NOT_FOUND, 'Payroll not found.', { id });
    return payroll;
  }

  async search(params: SearchParams): Promise<SearchResult<PayrollEntity>> {
    return this.searchService.search({
      qb: this.payrollRepository
        .createQueryBuilder('payroll')
        .leftJoinAndSelect('payroll.trainer', 'trainer')
        .leftJoinAndSelect('trainer.user', 'user'),
      params,
      options: {
        searchColumns: ['user.firstName', 'user.lastName', 'trainer.empNo'],
        allowedFilters: ['month', 'status', 'trainerId'],
        resolveColumn: columnResolver({
          month: 'payroll.month',
          status: 'payroll.status',
          trainerId: 'payroll.trainerId',
          netPay: 'payroll.netPay',
        }),
        allowedSorts: ['month', 'netPay'],
        defaultSorts: [{ field: 'month', direction: 'DESC' }],
      },
    });
  }

  /** 讲师的工资单，月份倒序 */
  async findByTrainer(trainerId: number): Promise<PayrollEntity[]> {
    return this.payrollRepository.find({ where: { trainerId }, order: { month: 'DESC' } });
  }

  async create(data: PayrollData): Promise<PayrollEntity> {
    const payroll = this.payrollRepository.create({
      month: data.month,
      trainerId: data.trainerId,
      earnings: data.earnings ?? {},
      deductions: data.deductions ?? {},
      netPay: data.netPay,
      status: data.status ?? DEFAULT_PAYROLL_STATUS,
    });
    return this.persist(payroll);
  }

  async update(id: number, patch: Partial<PayrollData>): Promise<PayrollEntity> {
    const payroll = await this.getOrThrow(id);
    const next = this.payrollRepository.merge(payroll, patch);
    if (patch.trainerId !== undefined) next.trainer = undefined;
    return this.persist(next);
  }

  async remove(id: number): Promise<void> {
    await this.payrollRepository.remove(await this.getOrThrow(id));
  }

  /** 工资合计（分） */
  async totalCents(): Promise<number> {
    const row = await this.payrollRepository
      .createQueryBuilder('payroll')
      .select('SUM(payroll.netPay)', 'total')
      .getRawOne<{ total: string | number | null }>();
    return toCents(row?.total ?? null);
  }

  /** 按月汇总工资（分） */
  async monthlyCents(): Promise<Map<string, number>> {
    const rows = await this.payrollRepository
      .createQueryBuilder('payroll')
      .select('payroll.month', 'month')
      .addSelect('SUM(payroll.netPay)', 'total')
      .groupBy('payroll.month')
      .getRawMany<{ month: string; total: string | number | null }>();
    return new Map(rows.map((row) => [row.month, toCents(row.total)]));
  }

  private async persist(payroll: PayrollEntity): Promise<PayrollEntity> {
    try {
      const saved = await this.payrollRepository.save(payroll);
      return await this.getOrThrow(saved.id);
    } catch (error) {
      if (isUniqueConstraintViolation(error)) {
        throw new DomainError(
          FINANCE_ERROR.PAYROLL_DUPLICATE,
          'Payroll for this trainer and month already exists.',
          { trainerId: payroll.trainerId, month: payroll.month },
          error,
        );
      }
      throw error;
    }
  }
}
