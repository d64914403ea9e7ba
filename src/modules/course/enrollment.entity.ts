// src/modules/course/enrollment.entity.ts
import { EnrollmentStatus } from '@app-types/models/course.types';
import { StudentEntity } from '@modules/student/student.entity';
import {
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  Unique,
} from 'typeorm';
import { BatchEntity } from './batch.entity';

/**
 * 报名实体
 * 对应数据库表：enrollments
 */
@Entity('enrollments')
@Unique('uk_enrollments_student_batch', ['studentId', 'batchId'])
@Index('idx_enrollments_batch_status', ['batchId', 'status'])
export class EnrollmentEntity {
  @PrimaryGeneratedColumn({ type: 'int' })
  id!: number;

  @Column({ name: 'student_id', type: 'int', comment: '引用 students.id' })
  studentId!: number;

  @ManyToOne(() => StudentEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'student_id' })
  student?: StudentEntity;

  @Column({ name: 'batch_id', type: 'int', comment: '引用 batches.id' })
  batchId!: number;

  @ManyToOne(() => BatchEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'batch_id' })
  batch?: BatchEntity;

  @Column({ name: 'enrolled_on', type: 'date', comment: '报名日期' })
  enrolledOn!: string;

  @Column({
    name: 'status',
    type: 'enum',
    enum: EnrollmentStatus,
    default: EnrollmentStatus.ACTIVE,
    comment: '报名状态',
  })
  status!: EnrollmentStatus;
}
