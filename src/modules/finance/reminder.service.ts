// src/modules/finance/reminder.service.ts
import { ReminderStatus } from '@app-types/models/finance.types';
import { DomainError, FINANCE_ERROR } from '@core/common/errors/domain-error';
import { columnResolver } from '@core/search/column-map';
import type { SearchParams, SearchResult } from '@core/search/search.types';
import { SearchService } from '@modules/common/search.module';
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { ReminderEntity } from './reminder.entity';

export interface ReminderData {
  readonly studentId: number;
  readonly courseId?: number | null;
  readonly batchId?: number | null;
  readonly message: string;
  readonly status?: ReminderStatus;
}

const REMINDER_RELATIONS = { student: { user: true }, course: true, batch: true, sentBy: true } as const;

/**
 * 缴费提醒服务
 */
@Injectable()
export class ReminderService {
  constructor(
    @InjectRepository(ReminderEntity)
    private readonly reminderRepository: Repository<ReminderEntity>,
    private readonly searchService: SearchService,
  ) {}

  async findById(id: number): Promise<ReminderEntity | null> {
    return this.reminderRepository.findOne({ where: { id }, relations: REMINDER_RELATIONS });
  }

  async getOrThrow(id: number): Promise<ReminderEntity> {
    const reminder = await this.findById(id);
    if (!reminder) throw new DomainError(FINANCE_ERROR.REMINDER_NOT_FOUND, 'Reminder not found.', { id });
    return reminder;
  }

  async search(params: SearchParams): Promise<SearchResult<ReminderEntity>> {
    return this.searchService.search({
      qb: this.reminderRepository
        .createQueryBuilder('reminder')
        .leftJoinAndSelect('reminder.student', 'student')
        .leftJoinAndSelect('student.user', 'user')
        .leftJoinAndSelect('reminder.course', 'course')
        .leftJoinAndSelect('reminder.batch', 'batch')
        .leftJoinAndSelect('reminder.sentBy', 'sentBy'),
      params,
      options: {
        searchColumns: ['reminder.message', 'student.regNo', 'user.username'],
        allowedFilters: ['status', 'studentId', 'courseId'],
        resolveColumn: columnResolver({
          status: 'reminder.status',
          studentId: 'reminder.studentId',
          courseId: 'reminder.courseId',
          sentAt: 'reminder.sentAt',
        }),
        allowedSorts: ['sentAt'],
        defaultSorts: [{ field: 'sentAt', direction: 'DESC' }],
      },
    });
  }

  /** 同一学员同一课程最近一次提醒 */
  async findLatest(studentId: number, courseId: number): Promise<ReminderEntity | null> {
    return this.reminderRepository.findOne({
      where: { studentId, courseId },
      order: { sentAt: 'DESC', id: 'DESC' },
    });
  }

  async create(data: ReminderData, sentById: number | null = null): Promise<ReminderEntity> {
    const saved = await this.reminderRepository.save(
      this.reminderRepository.create({
        studentId: data.studentId,
        courseId: data.courseId ?? null,
        batchId: data.batchId ?? null,
        message: data.message,
        status: data.status ?? ReminderStatus.PENDING,
        sentById,
      }),
    );
    return this.getOrThrow(saved.id);
  }

  async update(id: number, patch: Partial<ReminderData>): Promise<ReminderEntity> {
    const reminder = await this.getOrThrow(id);
    const next = this.reminderRepository.merge(reminder, patch);
    if (patch.studentId !== undefined) next.student = undefined;
    if (patch.courseId !== undefined) next.course = undefined;
    if (patch.batchId !== undefined) next.batch = undefined;
    await this.reminderRepository.save(next);
    return this.getOrThrow(id);
  }

  async setStatus(id: number, status: ReminderStatus): Promise<void> {
    await this.reminderRepository.update({ id }, { status });
  }

  async remove(id: number): Promise<void> {
    await this.reminderRepository.remove(await this.getOrThrow(id));
  }
}
