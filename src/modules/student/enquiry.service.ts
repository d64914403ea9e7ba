// src/modules/student/enquiry.service.ts
import { EnquiryStatus } from '@app-types/models/student.types';
import { DomainError, STUDENT_ERROR } from '@core/common/errors/domain-error';
import { columnResolver } from '@core/search/column-map';
import type { SearchParams, SearchResult } from '@core/search/search.types';
import { SearchService } from '@modules/common/search.module';
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { EnquiryEntity } from './enquiry.entity';

export interface EnquiryData {
  readonly name: string;
  readonly phone: string;
  readonly email?: string;
  readonly courseInterest: string;
  readonly source?: string;
  readonly status?: EnquiryStatus;
  readonly notes?: string | null;
}

/**
 * 咨询登记服务
 */
@Injectable()
export class EnquiryService {
  constructor(
    @InjectRepository(EnquiryEntity)
    private readonly enquiryRepository: Repository<EnquiryEntity>,
    private readonly searchService: SearchService,
  ) {}

  async getOrThrow(id: number): Promise<EnquiryEntity> {
    const enquiry = await this.enquiryRepository.findOne({ where: { id } });
    if (!enquiry) {
      throw new DomainError(STUDENT_ERROR.ENQUIRY_NOT_FOUND, 'Enquiry not found.', { id });
    }
    return enquiry;
  }

  async search(params: SearchParams): Promise<SearchResult<EnquiryEntity>> {
    return this.searchService.search({
      qb: this.enquiryRepository.createQueryBuilder('enquiry'),
      params,
      options: {
        searchColumns: ['enquiry.name', 'enquiry.phone', 'enquiry.email', 'enquiry.notes'],
        allowedFilters: ['status', 'courseInterest'],
        resolveColumn: columnResolver({
          status: 'enquiry.status',
          courseInterest: 'enquiry.courseInterest',
          createdAt: 'enquiry.createdAt',
          name: 'enquiry.name',
        }),
        allowedSorts: ['createdAt', 'name'],
        defaultSorts: [{ field: 'createdAt', direction: 'DESC' }],
      },
    });
  }

  async create(data: EnquiryData): Promise<EnquiryEntity> {
    const enquiry = this.enquiryRepository.create({
      name: data.name.trim(),
      phone: data.phone.trim(),
      email: data.email ?? '',
      courseInterest: data.courseInterest.trim(),
      source: data.source ?? '',
      status: data.status ?? EnquiryStatus.NEW,
      notes: data.notes ?? null,
    });
    return this.enquiryRepository.save(enquiry);
  }

  async update(id: number, patch: Partial<EnquiryData>): Promise<EnquiryEntity> {
    const enquiry = await this.getOrThrow(id);
    return this.enquiryRepository.save(this.enquiryRepository.merge(enquiry, patch));
  }

  async remove(id: number): Promise<void> {
    await this.enquiryRepository.remove(await this.getOrThrow(id));
  }
}
