// src/modules/finance/fees-receipt.service.ts
import { PaymentMode } from '@app-types/models/finance.types';
import { DomainError, FINANCE_ERROR } from '@core/common/errors/domain-error';
import { toCents } from '@core/common/numeric/money';
import { isUniqueConstraintViolation } from '@core/database/unique-violation';
import { columnResolver } from '@core/search/column-map';
import type { SearchParams, SearchResult } from '@core/search/search.types';
import { SearchService } from '@modules/common/search.module';
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { FeesReceiptEntity } from './fees-receipt.entity';

export interface FeesReceiptData {
  readonly receiptNo: string;
  readonly studentId: number;
  readonly courseId: number | null;
  readonly batchId: number | null;
  readonly amount: string;
  readonly mode: PaymentMode;
  readonly txnId?: string;
  readonly date: string;
  readonly postedById: number | null;
}

export type FeesReceiptPatch = Partial<Omit<FeesReceiptData, 'postedById'>> & {
  readonly locked?: boolean;
  readonly pdfFile?: string | null;
};

/** 按 (学员, 课程) 汇总的已缴金额，单位：分 */
export type PaidLedger = Map<string, number>;

export const paidKey = (studentId: number, courseId: number): string => `${studentId}:${courseId}`;

const RECEIPT_RELATIONS = { student: { user: true }, course: true, batch: true, postedBy: true } as const;

/**
 * 收据服务
 */
@Injectable()
export class FeesReceiptService {
  constructor(
    @InjectRepository(FeesReceiptEntity)
    private readonly receiptRepository: Repository<FeesReceiptEntity>,
    private readonly searchService: SearchService,
  ) {}

  private repo(manager?: EntityManager): Repository<FeesReceiptEntity> {
    return manager ? manager.getRepository(FeesReceiptEntity) : this.receiptRepository;
  }

  async findById(id: number, manager?: EntityManager): Promise<FeesReceiptEntity | null> {
    return this.repo(manager).findOne({ where: { id }, relations: RECEIPT_RELATIONS });
  }

  async getOrThrow(id: number, manager?: EntityManager): Promise<FeesReceiptEntity> {
    const receipt = await this.findById(id, manager);
    if (!receipt) throw new DomainError(FINANCE_ERROR.RECEIPT_NOT_FOUND, 'Receipt not found.', { id });
    return receipt;
  }

  async search(params: SearchParams): Promise<SearchResult<FeesReceiptEntity>> {
    return this.searchService.search({
      qb: this.receiptRepository
        .createQueryBuilder('receipt')
        .leftJoinAndSelect('receipt.student', 'student')
        .leftJoinAndSelect('student.user', 'user')
        .leftJoinAndSelect('receipt.course', 'course')
        .leftJoinAndSelect('receipt.batch', 'batch')
        .leftJoinAndSelect('receipt.postedBy', 'postedBy'),
      params,
      options: {
        searchColumns: ['receipt.receiptNo', 'receipt.txnId', 'user.username', 'student.regNo'],
        allowedFilters: ['mode', 'locked', 'date', 'studentId', 'courseId', 'batchId'],
        resolveColumn: columnResolver({
          mode: 'receipt.mode',
          locked: 'receipt.locked',
          date: 'receipt.date',
          studentId: 'receipt.studentId',
          courseId: 'receipt.courseId',
          batchId: 'receipt.batchId',
          amount: 'receipt.amount',
          receiptNo: 'receipt.receiptNo',
          id: 'receipt.id',
        }),
        allowedSorts: ['date', 'amount', 'receiptNo', 'id'],
        defaultSorts: [
          { field: 'date', direction: 'DESC' },
          { field: 'id', direction: 'DESC' },
        ],
      },
    });
  }

  /** 学员自己的收据，最新在前 */
  async findByStudent(studentId: number): Promise<FeesReceiptEntity[]> {
    return this.receiptRepository.find({
      where: { studentId },
      relations: RECEIPT_RELATIONS,
      order: { date: 'DESC', id: 'DESC' },
    });
  }

  /** 当前最大 id，无记录时为 0 */
  async lastId(manager?: EntityManager): Promise<number> {
    const last = await this.repo(manager).find({ order: { id: 'DESC' }, take: 1, select: { id: true } });
    return last.length > 0 ? last[0].id : 0;
  }

  async create(data: FeesReceiptData, manager?: EntityManager): Promise<FeesReceiptEntity> {
    const repo = this.repo(manager);
    return this.persist(
      repo,
      repo.create({
        receiptNo: data.receiptNo,
        studentId: data.studentId,
        courseId: data.courseId,
        batchId: data.batchId,
        amount: data.amount,
        mode: data.mode,
        txnId: data.txnId ?? '',
        date: data.date,
        postedById: data.postedById,
        locked: false,
        pdfFile: null,
      }),
    );
  }

  async update(
    receipt: FeesReceiptEntity,
    patch: FeesReceiptPatch,
    manager?: EntityManager,
  ): Promise<FeesReceiptEntity> {
    const repo = this.repo(manager);
    const next = repo.merge(receipt, patch);
    if (patch.studentId !== undefined) next.student = undefined;
    if (patch.courseId !== undefined) next.course = undefined;
    if (patch.batchId !== undefined) next.batch = undefined;
    return this.persist(repo, next);
  }

  async remove(receipt: FeesReceiptEntity): Promise<void> {
    await this.receiptRepository.remove(receipt);
  }

  /**
   * 已缴金额台账
   * 只统计带课程的收据，可按学员或课程缩小范围
   */
  async paidLedger(scope: {
    readonly studentIds?: ReadonlyArray<number>;
    readonly courseId?: number;
  } = {}): Promise<PaidLedger> {
    const qb = this.receiptRepository
      .createQueryBuilder('receipt')
      .select('receipt.studentId', 'studentId')
      .addSelect('receipt.courseId', 'courseId')
      .addSelect('SUM(receipt.amount)', 'total')
      .where('receipt.courseId IS NOT NULL')
      .groupBy('receipt.studentId')
      .addGroupBy('receipt.courseId');
    if (scope.studentIds) {
      if (scope.studentIds.length === 0) return new Map();
      qb.andWhere('receipt.studentId IN (:...studentIds)', { studentIds: [...scope.studentIds] });
    }
    if (scope.courseId !== undefined) {
      qb.andWhere('receipt.courseId = :courseId', { courseId: scope.courseId });
    }
    const rows = await qb.getRawMany<{
      studentId: number | string;
      courseId: number | string;
      total: string | number | null;
    }>();
    const ledger: PaidLedger = new Map();
    for (const row of rows) {
      ledger.set(paidKey(Number(row.studentId), Number(row.courseId)), toCents(row.total));
    }
    return ledger;
  }

  /** 学员在某课程下的已缴合计（分） */
  async paidCents(studentId: number, courseId: number, manager?: EntityManager): Promise<number> {
    const row = await this.repo(manager)
      .createQueryBuilder('receipt')
      .select('SUM(receipt.amount)', 'total')
      .where('receipt.studentId = :studentId', { studentId })
      .andWhere('receipt.courseId = :courseId', { courseId })
      .getRawOne<{ total: string | number | null }>();
    return toCents(row?.total ?? null);
  }

  /** 班级内按学员汇总的已缴金额（分），只统计该班级名下的收据 */
  async paidByStudentInBatch(batchId: number): Promise<Map<number, number>> {
    const rows = await this.receiptRepository
      .createQueryBuilder('receipt')
      .select('receipt.studentId', 'studentId')
      .addSelect('SUM(receipt.amount)', 'total')
      .where('receipt.batchId = :batchId', { batchId })
      .groupBy('receipt.studentId')
      .getRawMany<{ studentId: number | string; total: string | number | null }>();
    return new Map(rows.map((row) => [Number(row.studentId), toCents(row.total)]));
  }

  /** 收入合计（分），可限定课程 */
  async totalCents(courseId?: number): Promise<number> {
    const qb = this.receiptRepository.createQueryBuilder('receipt').select('SUM(receipt.amount)', 'total');
    if (courseId !== undefined) qb.where('receipt.courseId = :courseId', { courseId });
    const row = await qb.getRawOne<{ total: string | number | null }>();
    return toCents(row?.total ?? null);
  }

  /** 按月汇总收入（分），键为 YYYY-MM */
  async monthlyCents(): Promise<Map<string, number>> {
    const rows = await this.receiptRepository
      .createQueryBuilder('receipt')
      .select("DATE_FORMAT(receipt.date, '%Y-%m')", 'month')
      .addSelect('SUM(receipt.amount)', 'total')
      .groupBy('month')
      .getRawMany<{ month: string; total: string | number | null }>();
    return new Map(rows.map((row) => [row.month, toCents(row.total)]));
  }

  /** 给定学员中至少有一张收据的学员 id */
  async studentIdsWithReceipts(studentIds: ReadonlyArray<number>): Promise<Set<number>> {
    if (studentIds.length === 0) return new Set();
    const rows = await this.receiptRepository
      .createQueryBuilder('receipt')
      .select('DISTINCT receipt.studentId', 'studentId')
      .where('receipt.studentId IN (:...studentIds)', { studentIds: [...studentIds] })
      .getRawMany<{ studentId: number | string }>();
    return new Set(rows.map((row) => Number(row.studentId)));
  }

  private async persist(
    repo: Repository<FeesReceiptEntity>,
    receipt: FeesReceiptEntity,
  ): Promise<FeesReceiptEntity> {
    try {
      return await repo.save(receipt);
    } catch (error) {
      if (isUniqueConstraintViolation(error)) {
        throw new DomainError(
          FINANCE_ERROR.RECEIPT_NO_ALREADY_EXISTS,
          'Receipt with this number already exists.',
          { receiptNo: receipt.receiptNo },
          error,
        );
      }
      throw error;
    }
  }
}
