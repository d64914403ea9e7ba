// src/modules/event/event.service.ts
import { DomainError, EVENT_ERROR } from '@core/common/errors/domain-error';
import { columnResolver } from '@core/search/column-map';
import type { SearchParams, SearchResult } from '@core/search/search.types';
import { SearchService } from '@modules/common/search.module';
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { EventEntity } from './event.entity';

export interface EventData {
  readonly title: string;
  readonly description?: string | null;
  readonly startDate: string;
  readonly endDate: string;
}

/** 可见性：员工可见全部，其余仅可见 endDate ≥ today 的活动 */
export interface EventVisibility {
  readonly staff: boolean;
  readonly today: string;
}

const STAFF_VISIBILITY: EventVisibility = { staff: true, today: '' };

/**
 * 活动服务
 * 非员工只能看到尚未结束的活动
 */
@Injectable()
export class EventService {
  constructor(
    @InjectRepository(EventEntity)
    private readonly eventRepository: Repository<EventEntity>,
    private readonly searchService: SearchService,
  ) {}

  async findVisible(id: number, visibility: EventVisibility): Promise<EventEntity | null> {
    const qb = this.eventRepository
      .createQueryBuilder('event')
      .leftJoinAndSelect('event.createdBy', 'createdBy')
      .where('event.id = :id', { id });
    if (!visibility.staff) qb.andWhere('event.endDate >= :today', { today: visibility.today });
    return qb.getOne();
  }

  async getOrThrow(id: number, visibility: EventVisibility = STAFF_VISIBILITY): Promise<EventEntity> {
    const event = await this.findVisible(id, visibility);
    if (!event) throw new DomainError(EVENT_ERROR.EVENT_NOT_FOUND, 'Event not found.', { id });
    return event;
  }

  async search(
    params: SearchParams,
    visibility: EventVisibility,
  ): Promise<SearchResult<EventEntity>> {
    const qb = this.eventRepository
      .createQueryBuilder('event')
      .leftJoinAndSelect('event.createdBy', 'createdBy');
    if (!visibility.staff) qb.where('event.endDate >= :today', { today: visibility.today });
    return this.searchService.search({
      qb,
      params,
      options: {
        searchColumns: ['event.title', 'event.description'],
        resolveColumn: columnResolver({
          startDate: 'event.startDate',
          endDate: 'event.endDate',
          title: 'event.title',
        }),
        allowedSorts: ['startDate', 'endDate', 'title'],
        defaultSorts: [{ field: 'startDate', direction: visibility.staff ? 'DESC' : 'ASC' }],
      },
    });
  }

  async create(data: EventData, createdById: number | null): Promise<EventEntity> {
    const saved = await this.eventRepository.save(
      this.eventRepository.create({
        title: data.title,
        description: data.description ?? null,
        startDate: data.startDate,
        endDate: data.endDate,
        createdById,
      }),
    );
    return this.getOrThrow(saved.id);
  }

  async update(event: EventEntity, patch: Partial<EventData>): Promise<EventEntity> {
    await this.eventRepository.save(this.eventRepository.merge(event, patch));
    return this.getOrThrow(event.id);
  }

  async remove(id: number): Promise<void> {
    await this.eventRepository.remove(await this.getOrThrow(id));
  }
}
