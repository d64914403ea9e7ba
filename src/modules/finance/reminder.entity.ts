// src/modules/finance/reminder.entity.ts
import { ReminderStatus } from '@app-types/models/finance.types';
import { UserEntity } from '@modules/account/user.entity';
import { BatchEntity } from '@modules/course/batch.entity';
import { CourseEntity } from '@modules/course/course.entity';
import { StudentEntity } from '@modules/student/student.entity';
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
 * 催缴提醒实体
 * 对应数据库表：reminders
 */
@Entity('reminders')
@Index('idx_reminders_student_course_sent', ['studentId', 'courseId', 'sentAt'])
export class ReminderEntity {
  @PrimaryGeneratedColumn({ type: 'int' })
  id!: number;

  @Column({ name: 'student_id', type: 'int', comment: '引用 students.id' })
  studentId!: number;

  @ManyToOne(() => StudentEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'student_id' })
  student?: StudentEntity;

  @Column({ name: 'course_id', type: 'int', nullable: true, comment: '引用 courses.id' })
  courseId!: number | null;

  @ManyToOne(() => CourseEntity, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'course_id' })
  course?: CourseEntity | null;

  @Column({ name: 'batch_id', type: 'int', nullable: true, comment: '引用 batches.id' })
  batchId!: number | null;

  @ManyToOne(() => BatchEntity, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'batch_id' })
  batch?: BatchEntity | null;

  @Column({ name: 'message', type: 'text', comment: '提醒内容' })
  message!: string;

  @CreateDateColumn({ name: 'sent_at', type: 'timestamp', comment: '创建/发送时间' })
  sentAt!: Date;

  @Column({ name: 'sent_by', type: 'int', nullable: true, comment: '发起人 users.id' })
  sentById!: number | null;

  @ManyToOne(() => UserEntity, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'sent_by' })
  sentBy?: UserEntity | null;

  @Column({
    name: 'status',
    type: 'enum',
    enum: ReminderStatus,
    default: ReminderStatus.PENDING,
    comment: '提醒状态',
  })
  status!: ReminderStatus;
}
