// src/modules/student/measurement.service.ts
import { DomainError, STUDENT_ERROR } from '@core/common/errors/domain-error';
import type { OffsetParams } from '@core/pagination/pagination.policy';
import { columnResolver } from '@core/search/column-map';
import type { SearchResult } from '@core/search/search.types';
import { SearchService } from '@modules/common/search.module';
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { MeasurementEntity } from './measurement.entity';

export interface MeasurementData {
  readonly dateTaken?: string;
  readonly neck?: string | null;
  readonly chest?: string | null;
  readonly waist?: string | null;
  readonly hips?: string | null;
  readonly sleeveLength?: string | null;
  readonly inseam?: string | null;
  readonly notes?: string | null;
}

/**
 * 量体记录服务：所有操作都限定在路径中的学员下
 */
@Injectable()
export class MeasurementService {
  constructor(
    @InjectRepository(MeasurementEntity)
    private readonly measurementRepository: Repository<MeasurementEntity>,
    private readonly searchService: SearchService,
  ) {}

  async listByStudent(
    studentId: number,
    pagination: Partial<OffsetParams>,
  ): Promise<SearchResult<MeasurementEntity>> {
    return this.searchService.search({
      qb: this.measurementRepository
        .createQueryBuilder('measurement')
        .where('measurement.studentId = :studentId', { studentId }),
      params: { pagination },
      options: {
        searchColumns: [],
        resolveColumn: columnResolver({ dateTaken: 'measurement.dateTaken', id: 'measurement.id' }),
        allowedSorts: ['dateTaken', 'id'],
        defaultSorts: [{ field: 'dateTaken', direction: 'DESC' }],
      },
    });
  }

  async getOrThrow(studentId: number, id: number): Promise<MeasurementEntity> {
    const measurement = await this.measurementRepository.findOne({ where: { id, studentId } });
    if (!measurement) {
      throw new DomainError(STUDENT_ERROR.MEASUREMENT_NOT_FOUND, 'Measurement not found.', {
        studentId,
        id,
      });
    }
    return measurement;
  }

  async create(studentId: number, data: MeasurementData, today: string): Promise<MeasurementEntity> {
    const measurement = this.measurementRepository.create({
      studentId,
      dateTaken: data.dateTaken ?? today,
      neck: data.neck ?? null,
      chest: data.chest ?? null,
      waist: data.waist ?? null,
      hips: data.hips ?? null,
      sleeveLength: data.sleeveLength ?? null,
      inseam: data.inseam ?? null,
      notes: data.notes ?? null,
    });
    return this.measurementRepository.save(measurement);
  }

  async update(studentId: number, id: number, patch: MeasurementData): Promise<MeasurementEntity> {
    const measurement = await this.getOrThrow(studentId, id);
    return this.measurementRepository.save(this.measurementRepository.merge(measurement, patch));
  }

  async remove(studentId: number, id: number): Promise<void> {
    await this.measurementRepository.remove(await this.getOrThrow(studentId, id));
  }
}
