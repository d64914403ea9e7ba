// src/modules/event/event.entity.ts
import { UserEntity } from '@modules/account/user.entity';
import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';

/**
 * 机构活动实体
 * 对应数据库表：events
 */
@Entity('events')
@Index('idx_events_start', ['startDate'])
@Index('idx_events_end', ['endDate'])
export class EventEntity {
  @PrimaryGeneratedColumn({ type: 'int' })
  id!: number;

  @Column({ name: 'title', type: 'varchar', length: 200, comment: '标题' })
  title!: string;

  @Column({ name: 'description', type: 'text', nullable: true, comment: '说明' })
  description!: string | null;

  @Column({ name: 'start_date', type: 'date', comment: '开始日期' })
  startDate!: string;

  /** 结束日期，未填写时等于开始日期 */
  @Column({ name: 'end_date', type: 'date', comment: '结束日期' })
  endDate!: string;

  @Column({ name: 'created_by', type: 'int', nullable: true, comment: '创建人 users.id' })
  createdById!: number | null;

  @ManyToOne(() => UserEntity, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'created_by' })
  createdBy?: UserEntity | null;

  @CreateDateColumn({ name: 'created_at', type: 'timestamp', comment: '创建时间' })
  createdAt!: Date;
}
