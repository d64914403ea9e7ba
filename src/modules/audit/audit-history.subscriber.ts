// src/modules/audit/audit-history.subscriber.ts
import { AuditSnapshot, HistoryType } from '@app-types/models/audit.types';
import { StudentEntity } from '@modules/student/student.entity';
import type {
  EntityManager,
  EntitySubscriberInterface,
  InsertEvent,
  ObjectLiteral,
  QueryRunner,
  RemoveEvent,
  UpdateEvent,
} from 'typeorm';
import { UserEntity } from '../account/user.entity';
import { AuditHistoryEntity } from './audit-history.entity';

/** 保存/删除时通过 `{ data: { actor } }` 传入操作人用户名 */
export interface AuditActorData {
  actor?: string;
}

/** 用户快照：不含密码相关字段 */
export function snapshotUser(user: UserEntity): AuditSnapshot {
  return {
    username: user.username,
    email: user.email,
    firstName: user.firstName,
    lastName: user.lastName,
    isActive: user.isActive,
    isStaff: user.isStaff,
    isSuperuser: user.isSuperuser,
  };
}

export function snapshotStudent(student: StudentEntity): AuditSnapshot {
  return {
    regNo: student.regNo,
    userId: student.userId,
    guardianName: student.guardianName,
    guardianPhone: student.guardianPhone,
    active: student.active,
    admissionDate: student.admissionDate,
  };
}

/**
 * 从 queryRunner.data 中读取操作人
 */
export function readActor(queryRunner: Pick<QueryRunner, 'data'> | undefined): string | null {
  const data: unknown = queryRunner?.data;
  if (!data || typeof data !== 'object' || !('actor' in data)) return null;
  return typeof data.actor === 'string' && data.actor.length > 0 ? data.actor : null;
}

/**
 * 将实体映射为 [实体名, 主键, 快照]；非审计对象返回 null
 */
export function describeAudited(
  entity: ObjectLiteral | undefined,
): { entityName: string; entityId: number; snapshot: AuditSnapshot } | null {
  if (entity instanceof UserEntity && entity.id) {
    return { entityName: 'User', entityId: entity.id, snapshot: snapshotUser(entity) };
  }
  if (entity instanceof StudentEntity && entity.id) {
    return { entityName: 'Student', entityId: entity.id, snapshot: snapshotStudent(entity) };
  }
  return null;
}

/**
 * 用户与学员的变更历史订阅器
 * 写入与业务操作处于同一事务（同一 EntityManager）
 * 只覆盖 save / remove；QueryBuilder 的 update / delete 不会触发
 */
export class AuditHistorySubscriber implements EntitySubscriberInterface {
  async afterInsert(event: InsertEvent<ObjectLiteral>): Promise<void> {
    await this.recordChange({
      manager: event.manager,
      queryRunner: event.queryRunner,
      entity: event.entity,
      historyType: HistoryType.CREATED,
    });
  }

  async afterUpdate(event: UpdateEvent<ObjectLiteral>): Promise<void> {
    await this.recordChange({
      manager: event.manager,
      queryRunner: event.queryRunner,
      entity: event.entity,
      historyType: HistoryType.CHANGED,
    });
  }

  async beforeRemove(event: RemoveEvent<ObjectLiteral>): Promise<void> {
    await this.recordChange({
      manager: event.manager,
      queryRunner: event.queryRunner,
      entity: event.entity ?? event.databaseEntity,
      historyType: HistoryType.DELETED,
    });
  }

  /**
   * 写入一条历史；非审计实体直接忽略
   */
  async recordChange(input: {
    readonly manager: Pick<EntityManager, 'getRepository'>;
    readonly queryRunner?: Pick<QueryRunner, 'data'>;
    readonly entity: ObjectLiteral | undefined;
    readonly historyType: HistoryType;
  }): Promise<void> {
    const audited = describeAudited(input.entity);
    if (!audited) return;
    await input.manager.getRepository(AuditHistoryEntity).insert({
      ...audited,
      actorUsername: readActor(input.queryRunner),
      historyType: input.historyType,
    });
  }
}
