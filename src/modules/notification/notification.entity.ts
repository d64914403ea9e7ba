// src/modules/notification/notification.entity.ts
import { NotificationLevel } from '@app-types/models/notification.types';
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
 * 站内通知实体
 * 对应数据库表：notifications
 */
@Entity('notifications')
@Index('idx_notifications_user_read', ['userId', 'isRead'])
@Index('idx_notifications_user_title', ['userId', 'title'])
export class NotificationEntity {
  @PrimaryGeneratedColumn({ type: 'int' })
  id!: number;

  @Column({ name: 'user_id', type: 'int', comment: '接收人 users.id' })
  userId!: number;

  @ManyToOne(() => UserEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'user_id' })
  user?: UserEntity;

  @Column({ name: 'title', type: 'varchar', length: 120, comment: '标题' })
  title!: string;

  @Column({ name: 'message', type: 'text', comment: '内容' })
  message!: string;

  @Column({
    name: 'level',
    type: 'enum',
    enum: NotificationLevel,
    default: NotificationLevel.INFO,
    comment: '级别',
  })
  level!: NotificationLevel;

  @Column({ name: 'is_read', type: 'boolean', default: false, comment: '是否已读' })
  isRead!: boolean;

  @CreateDateColumn({ name: 'created_at', type: 'timestamp', comment: '创建时间' })
  createdAt!: Date;
}
