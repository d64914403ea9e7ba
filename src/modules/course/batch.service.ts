// src/modules/course/batch.service.ts
import { BatchSchedule } from '@app-types/models/course.types';
import { COURSE_ERROR, DomainError } from '@core/common/errors/domain-error';
import { isUniqueConstraintViolation } from '@core/database/unique-violation';
import { columnResolver } from '@core/search/column-map';
import type { SearchParams, SearchResult } from '@core/search/search.types';
import { SearchService } from '@modules/common/search.module';
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository, SelectQueryBuilder } from 'typeorm';
import { BatchEntity } from './batch.entity';

export interface BatchData {
  readonly courseId: number;
  readonly trainerId?: number | null;
  readonly code: string;
  readonly startDate: string;
  readonly endDate: string;
  readonly capacity?: number;
  readonly schedule?: BatchSchedule | null;
}

const BATCH_RELATIONS = { course: true, trainer: { user: true } } as const;

/**
 * 班级服务
 * 读取时总是带上课程与讲师（含讲师用户），用于展示 courseTitle / trainerName
 */
@Injectable()
export class BatchService {
  constructor(
    @InjectRepository(BatchEntity)
    private readonly batchRepository: Repository<BatchEntity>,
    private readonly searchService: SearchService,
  ) {}

  private repo(manager?: EntityManager): Repository<BatchEntity> {
    return manager ? manager.getRepository(BatchEntity) : this.batchRepository;
  }

  private baseQuery(): SelectQueryBuilder<BatchEntity> {
    return this.batchRepository
      .createQueryBuilder('batch')
      .leftJoinAndSelect('batch.course', 'course')
      .leftJoinAndSelect('batch.trainer', 'trainer')
      .leftJoinAndSelect('trainer.user', 'trainerUser');
  }

  async findById(id: number, manager?: EntityManager): Promise<BatchEntity | null> {
    return this.repo(manager).findOne({ where: { id }, relations: BATCH_RELATIONS });
  }

  async getOrThrow(id: number, manager?: EntityManager): Promise<BatchEntity> {
    const batch = await this.findById(id, manager);
    if (!batch) throw new DomainError(COURSE_ERROR.BATCH_NOT_FOUND, 'Batch not found.', { id });
    return batch;
  }

  /** 事务内锁定班级行，报名时串行化名额检查 */
  async lockForUpdate(id: number, manager: EntityManager): Promise<BatchEntity> {
    const batch = await manager
      .getRepository(BatchEntity)
      .findOne({ where: { id }, lock: { mode: 'pessimistic_write' } });
    if (!batch) throw new DomainError(COURSE_ERROR.BATCH_NOT_FOUND, 'Batch not found.', { id });
    return batch;
  }

  /** 某日开班的班级（含讲师用户） */
  async findStartingOn(date: string): Promise<BatchEntity[]> {
    return this.baseQuery().where('batch.startDate = :date', { date }).getMany();
  }

  async search(params: SearchParams): Promise<SearchResult<BatchEntity>> {
    return this.searchService.search({
      qb: this.baseQuery(),
      params,
      options: {
        searchColumns: ['batch.code'],
        allowedFilters: ['courseId', 'trainerId', 'startDate'],
        resolveColumn: columnResolver({
          courseId: 'batch.courseId',
          trainerId: 'batch.trainerId',
          startDate: 'batch.startDate',
          code: 'batch.code',
        }),
        allowedSorts: ['startDate', 'code'],
        defaultSorts: [{ field: 'startDate', direction: 'DESC' }],
      },
    });
  }

  async create(data: BatchData): Promise<BatchEntity> {
    const batch = this.batchRepository.create({
      courseId: data.courseId,
      trainerId: data.trainerId ?? null,
      code: data.code.trim(),
      startDate: data.startDate,
      endDate: data.endDate,
      capacity: data.capacity ?? 10,
      schedule: data.schedule ?? null,
    });
    return this.persist(batch);
  }

  async update(id: number, patch: Partial<BatchData>): Promise<BatchEntity> {
    const batch = await this.getOrThrow(id);
    const next = this.batchRepository.merge(batch, patch);
    // 外键变更时丢弃已加载的关系对象
    if (patch.courseId !== undefined) next.course = undefined;
    if (patch.trainerId !== undefined) next.trainer = undefined;
    return this.persist(next);
  }

  async remove(id: number): Promise<void> {
    await this.batchRepository.remove(await this.getOrThrow(id));
  }

  private async persist(batch: BatchEntity): Promise<BatchEntity> {
    try {
      const saved = await this.batchRepository.save(batch);
      return await this.getOrThrow(saved.id);
    } catch (error) {
      if (isUniqueConstraintViolation(error)) {
        throw new DomainError(
          COURSE_ERROR.BATCH_CODE_ALREADY_EXISTS,
          'Batch with this code already exists.',
          { code: batch.code },
          error,
        );
      }
      throw error;
    }
  }
}
