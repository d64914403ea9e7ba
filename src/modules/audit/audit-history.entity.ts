// src/modules/audit/audit-history.entity.ts
import { AuditSnapshot, HistoryType } from '@app-types/models/audit.types';
import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

/**
 * 变更历史实体
 * 对应数据库表：audit_history
 * 仅追加，不更新
 */
@Entity('audit_history')
@Index('idx_audit_entity', ['entityName', 'entityId'])
@Index('idx_audit_date', ['historyDate'])
export class AuditHistoryEntity {
  @PrimaryGeneratedColumn({ type: 'int' })
  id!: number;

  @Column({ name: 'entity_name', type: 'varchar', length: 50, comment: '实体名，如 User / Student' })
  entityName!: string;

  @Column({ name: 'entity_id', type: 'int', comment: '实体主键' })
  entityId!: number;

  @Column({ name: 'snapshot', type: 'json', comment: '白名单字段快照' })
  snapshot!: AuditSnapshot;

  @Column({
    name: 'actor_username',
    type: 'varchar',
    length: 150,
    nullable: true,
    comment: '操作人用户名（无请求上下文时为空）',
  })
  actorUsername!: string | null;

  @Column({
    name: 'history_type',
    type: 'enum',
    enum: HistoryType,
    comment: '+ 新增，~ 修改，- 删除',
  })
  historyType!: HistoryType;

  @CreateDateColumn({ name: 'history_date', type: 'timestamp', comment: '记录时间' })
  historyDate!: Date;
}
