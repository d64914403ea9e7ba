// src/modules/notification/notification.service.ts
import { NotificationLevel } from '@app-types/models/notification.types';
import { DomainError, NOTIFICATION_ERROR } from '@core/common/errors/domain-error';
import { columnResolver } from '@core/search/column-map';
import type { SearchParams, SearchResult } from '@core/search/search.types';
import { SearchService } from '@modules/common/search.module';
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { NotificationEntity } from './notification.entity';

export interface NotificationData {
  readonly title: string;
  readonly message: string;
  readonly level?: NotificationLevel;
  readonly isRead?: boolean;
}

/**
 * 通知服务：所有读写都限定在某个用户下
 */
@Injectable()
export class NotificationService {
  constructor(
    @InjectRepository(NotificationEntity)
    private readonly notificationRepository: Repository<NotificationEntity>,
    private readonly searchService: SearchService,
  ) {}

  async getOwnedOrThrow(userId: number, id: number): Promise<NotificationEntity> {
    const notification = await this.notificationRepository.findOne({ where: { id, userId } });
    if (!notification) {
      throw new DomainError(NOTIFICATION_ERROR.NOTIFICATION_NOT_FOUND, 'Notification not found.', {
        id,
      });
    }
    return notification;
  }

  async searchOwned(userId: number, params: SearchParams): Promise<SearchResult<NotificationEntity>> {
    return this.searchService.search({
      qb: this.notificationRepository
        .createQueryBuilder('notification')
        .where('notification.userId = :userId', { userId }),
      params,
      options: {
        searchColumns: ['notification.title', 'notification.message'],
        allowedFilters: ['isRead', 'level'],
        resolveColumn: columnResolver({
          isRead: 'notification.isRead',
          level: 'notification.level',
          createdAt: 'notification.createdAt',
          id: 'notification.id',
        }),
        allowedSorts: ['createdAt', 'id'],
        defaultSorts: [
          { field: 'createdAt', direction: 'DESC' },
          { field: 'id', direction: 'DESC' },
        ],
      },
    });
  }

  async create(userId: number, data: NotificationData): Promise<NotificationEntity> {
    return this.notificationRepository.save(
      this.notificationRepository.create({
        userId,
        title: data.title,
        message: data.message,
        level: data.level ?? NotificationLevel.INFO,
        isRead: data.isRead ?? false,
      }),
    );
  }

  /** 为多个用户各创建一条相同内容的通知，返回创建数 */
  async createForUsers(userIds: ReadonlyArray<number>, data: NotificationData): Promise<number> {
    if (userIds.length === 0) return 0;
    const rows = userIds.map((userId) =>
      this.notificationRepository.create({
        userId,
        title: data.title,
        message: data.message,
        level: data.level ?? NotificationLevel.INFO,
        isRead: false,
      }),
    );
    await this.notificationRepository.save(rows, { chunk: 100 });
    return rows.length;
  }

  /**
   * 按 (用户, 标题) 取已有通知，不存在时创建
   */
  async getOrCreate(
    userId: number,
    data: NotificationData,
  ): Promise<{ notification: NotificationEntity; created: boolean }> {
    const existing = await this.notificationRepository.findOne({ where: { userId, title: data.title } });
    if (existing) return { notification: existing, created: false };
    return { notification: await this.create(userId, data), created: true };
  }

  async update(userId: number, id: number, patch: Partial<NotificationData>): Promise<NotificationEntity> {
    const notification = await this.getOwnedOrThrow(userId, id);
    return this.notificationRepository.save(this.notificationRepository.merge(notification, patch));
  }

  async remove(userId: number, id: number): Promise<void> {
    await this.notificationRepository.remove(await this.getOwnedOrThrow(userId, id));
  }

  /** 全部标为已读，返回更新条数 */
  async markAllRead(userId: number): Promise<number> {
    const result = await this.notificationRepository.update({ userId, isRead: false }, { isRead: true });
    return result.affected ?? 0;
  }
}
