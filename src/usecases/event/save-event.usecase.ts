// src/usecases/event/save-event.usecase.ts
import { type UsecaseSession, isStaffSession } from '@app-types/auth/session.types';
import { compareDateStrings, todayString } from '@core/common/date/date.helper';
import { DomainError, EVENT_ERROR } from '@core/common/errors/domain-error';
import type { SearchParams, SearchResult } from '@core/search/search.types';
import { EventEntity } from '@modules/event/event.entity';
import { EventService, EventVisibility } from '@modules/event/event.service';
import { Injectable } from '@nestjs/common';

export const EVENT_DATE_RANGE_MESSAGE = 'End date cannot be before the start date.';

export interface EventInput {
  readonly title: string;
  readonly description?: string | null;
  readonly startDate: string;
  readonly endDate?: string | null;
}

/**
 * 活动：未填结束日期时取开始日期
 */
@Injectable()
export class SaveEventUsecase {
  constructor(private readonly eventService: EventService) {}

  /** 匿名访问时 session 为空 */
  visibility(session: UsecaseSession | null, today: string = todayString()): EventVisibility {
    return { staff: session !== null && isStaffSession(session), today };
  }

  async list(session: UsecaseSession | null, params: SearchParams): Promise<SearchResult<EventEntity>> {
    return this.eventService.search(params, this.visibility(session));
  }

  async get(session: UsecaseSession | null, id: number): Promise<EventEntity> {
    return this.eventService.getOrThrow(id, this.visibility(session));
  }

  async create(session: UsecaseSession, input: EventInput): Promise<EventEntity> {
    const endDate = input.endDate || input.startDate;
    assertEventRange(input.startDate, endDate);
    return this.eventService.create(
      { title: input.title, description: input.description, startDate: input.startDate, endDate },
      session.accountId,
    );
  }

  async update(id: number, patch: Partial<EventInput>): Promise<EventEntity> {
    const current = await this.eventService.getOrThrow(id);
    const startDate = patch.startDate ?? current.startDate;
    const endDate = patch.endDate === null ? startDate : (patch.endDate ?? current.endDate);
    assertEventRange(startDate, endDate);
    return this.eventService.update(current, {
      title: patch.title,
      description: patch.description,
      startDate,
      endDate,
    });
  }
}

export function assertEventRange(startDate: string, endDate: string): void {
  if (compareDateStrings(endDate, startDate) < 0) {
    throw new DomainError(EVENT_ERROR.INVALID_DATE_RANGE, EVENT_DATE_RANGE_MESSAGE, { startDate, endDate });
  }
}
