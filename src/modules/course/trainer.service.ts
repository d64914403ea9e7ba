// src/modules/course/trainer.service.ts
import { COURSE_ERROR, DomainError } from '@core/common/errors/domain-error';
import { isUniqueConstraintViolation } from '@core/database/unique-violation';
import { columnResolver } from '@core/search/column-map';
import type { SearchParams, SearchResult } from '@core/search/search.types';
import { SearchService } from '@modules/common/search.module';
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { TrainerEntity } from './trainer.entity';

export interface TrainerData {
  readonly userId: number;
  readonly empNo: string;
  readonly joinDate: string;
  readonly salary?: string;
  readonly isActive?: boolean;
}

/**
 * 讲师服务
 */
@Injectable()
export class TrainerService {
  constructor(
    @InjectRepository(TrainerEntity)
    private readonly trainerRepository: Repository<TrainerEntity>,
    private readonly searchService: SearchService,
  ) {}

  async findById(id: number): Promise<TrainerEntity | null> {
    return this.trainerRepository.findOne({ where: { id }, relations: ['user'] });
  }

  async getOrThrow(id: number): Promise<TrainerEntity> {
    const trainer = await this.findById(id);
    if (!trainer) {
      throw new DomainError(COURSE_ERROR.TRAINER_NOT_FOUND, 'Trainer not found.', { id });
    }
    return trainer;
  }

  async search(params: SearchParams): Promise<SearchResult<TrainerEntity>> {
    return this.searchService.search({
      qb: this.trainerRepository
        .createQueryBuilder('trainer')
        .leftJoinAndSelect('trainer.user', 'user'),
      params,
      options: {
        searchColumns: ['trainer.empNo', 'user.firstName', 'user.lastName'],
        allowedFilters: ['isActive', 'joinDate'],
        resolveColumn: columnResolver({
          isActive: 'trainer.isActive',
          joinDate: 'trainer.joinDate',
          empNo: 'trainer.empNo',
          firstName: 'user.firstName',
        }),
        allowedSorts: ['firstName', 'empNo', 'joinDate'],
        defaultSorts: [{ field: 'firstName', direction: 'ASC' }],
      },
    });
  }

  async create(data: TrainerData): Promise<TrainerEntity> {
    const trainer = this.trainerRepository.create({
      userId: data.userId,
      empNo: data.empNo.trim(),
      joinDate: data.joinDate,
      salary: data.salary ?? '0.00',
      isActive: data.isActive ?? true,
    });
    return this.persist(trainer);
  }

  async update(id: number, patch: Partial<TrainerData>): Promise<TrainerEntity> {
    const trainer = await this.getOrThrow(id);
    const next = this.trainerRepository.merge(trainer, patch);
    if (patch.userId !== undefined) next.user = undefined;
    return this.persist(next);
  }

  async remove(id: number): Promise<void> {
    await this.trainerRepository.remove(await this.getOrThrow(id));
  }

  private async persist(trainer: TrainerEntity): Promise<TrainerEntity> {
    try {
      const saved = await this.trainerRepository.save(trainer);
      return await this.getOrThrow(saved.id);
    } catch (error) {
      if (isUniqueConstraintViolation(error)) {
        throw new DomainError(
          COURSE_ERROR.TRAINER_ALREADY_EXISTS,
          'A trainer with this employee number or user already exists.',
          { empNo: trainer.empNo, userId: trainer.userId },
          error,
        );
      }
      throw error;
    }
  }
}
