// src/modules/audit/audit-history.service.ts
import { AuditSnapshot, HistoryType } from '@app-types/models/audit.types';
import { columnResolver } from '@core/search/column-map';
import type { OffsetParams, PaginatedResult } from '@core/pagination/pagination.policy';
import { SearchService } from '@modules/common/search.module';
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { UserEntity } from '../account/user.entity';
import { AuditHistoryEntity } from './audit-history.entity';

export interface UserHistoryRow {
  readonly historyId: number;
  readonly historyDate: Date;
  readonly historyUserName: string | null;
  readonly historyType: HistoryType;
  readonly username: string | null;
  readonly email: string | null;
  readonly isActive: boolean | null;
}

export interface StudentHistoryRow {
  readonly historyId: number;
  readonly historyDate: Date;
  readonly historyUserName: string | null;
  readonly historyType: HistoryType;
  readonly regNo: string | null;
  readonly userName: string | null;
  readonly guardianName: string | null;
  readonly active: boolean | null;
}

const readString = (snapshot: AuditSnapshot, key: string): string | null => {
  const value = snapshot[key];
  return typeof value === 'string' ? value : null;
};

const readBoolean = (snapshot: AuditSnapshot, key: string): boolean | null => {
  const value = snapshot[key];
  return typeof value === 'boolean' ? value : null;
};

/**
 * 变更历史查询服务（只读）
 */
@Injectable()
export class AuditHistoryService {
  constructor(
    @InjectRepository(AuditHistoryEntity)
    private readonly historyRepository: Repository<AuditHistoryEntity>,
    @InjectRepository(UserEntity)
    private readonly userRepository: Repository<UserEntity>,
    private readonly searchService: SearchService,
  ) {}

  async listUserHistory(pagination: Partial<OffsetParams>): Promise<PaginatedResult<UserHistoryRow>> {
    const page = await this.listByEntity('User', pagination);
    return {
      ...page,
      items: page.items.map((row) => ({
        ...this.baseRow(row),
        username: readString(row.snapshot, 'username'),
        email: readString(row.snapshot, 'email'),
        isActive: readBoolean(row.snapshot, 'isActive'),
      })),
    };
  }

  async listStudentHistory(
    pagination: Partial<OffsetParams>,
  ): Promise<PaginatedResult<StudentHistoryRow>> {
    const page = await this.listByEntity('Student', pagination);
    const userIds = [
      ...new Set(
        page.items
          .map((row) => row.snapshot.userId)
          .filter((id): id is number => typeof id === 'number'),
      ),
    ];
    const users = userIds.length
      ? await this.userRepository.find({
          select: { id: true, username: true },
          where: { id: In(userIds) },
        })
      : [];
    const usernames = new Map(users.map((u) => [u.id, u.username]));

    return {
      ...page,
      items: page.items.map((row) => {
        const userId = row.snapshot.userId;
        return {
          ...this.baseRow(row),
          regNo: readString(row.snapshot, 'regNo'),
          userName: typeof userId === 'number' ? (usernames.get(userId) ?? null) : null,
          guardianName: readString(row.snapshot, 'guardianName'),
          active: readBoolean(row.snapshot, 'active'),
        };
      }),
    };
  }

  private async listByEntity(
    entityName: string,
    pagination: Partial<OffsetParams>,
  ): Promise<PaginatedResult<AuditHistoryEntity>> {
    return this.searchService.search({
      qb: this.historyRepository
        .createQueryBuilder('history')
        .where('history.entityName = :entityName', { entityName }),
      params: { pagination: { ...pagination, sorts: undefined } },
      options: {
        searchColumns: [],
        resolveColumn: columnResolver({ historyDate: 'history.historyDate', id: 'history.id' }),
        allowedSorts: ['historyDate', 'id'],
        defaultSorts: [
          { field: 'historyDate', direction: 'DESC' },
          { field: 'id', direction: 'DESC' },
        ],
      },
    });
  }

  private baseRow(row: AuditHistoryEntity) {
    return {
      historyId: row.id,
      historyDate: row.historyDate,
      historyUserName: row.actorUsername,
      historyType: row.historyType,
    };
  }
}
