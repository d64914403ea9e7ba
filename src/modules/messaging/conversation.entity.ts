// src/modules/messaging/conversation.entity.ts
import { StudentEntity } from '@modules/student/student.entity';
import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  OneToMany,
  OneToOne,
  PrimaryGeneratedColumn,
  Unique,
} from 'typeorm';
import { MessageEntity } from './message.entity';

/**
 * 会话实体：每名学员与管理方之间唯一一条会话
 * 对应数据库表：conversations
 */
@Entity('conversations')
@Unique('uk_conversations_student', ['studentId'])
@Index('idx_conversations_last_message', ['lastMessageAt'])
export class ConversationEntity {
  @PrimaryGeneratedColumn({ type: 'int' })
  id!: number;

  @Column({ name: 'student_id', type: 'int', comment: '引用 students.id' })
  studentId!: number;

  @OneToOne(() => StudentEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'student_id' })
  student?: StudentEntity;

  @CreateDateColumn({ name: 'created_at', type: 'timestamp', comment: '创建时间' })
  createdAt!: Date;

  @Column({ name: 'last_message_at', type: 'datetime', comment: '最近消息时间' })
  lastMessageAt!: Date;

  @Column({ name: 'student_read', type: 'boolean', default: true, comment: '学员已读' })
  studentRead!: boolean;

  @Column({ name: 'admin_read', type: 'boolean', default: true, comment: '管理方已读' })
  adminRead!: boolean;

  @OneToMany(() => MessageEntity, (message) => message.conversation)
  messages?: MessageEntity[];
}
