// src/modules/course/batch.entity.ts
import { BatchSchedule } from '@app-types/models/course.types';
import {
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  Unique,
} from 'typeorm';
import { CourseEntity } from './course.entity';
import { TrainerEntity } from './trainer.entity';

/**
 * 班级实体
 * 对应数据库表：batches
 */
@Entity('batches')
@Unique('uk_batches_code', ['code'])
@Index('idx_batches_course', ['courseId'])
@Index('idx_batches_trainer', ['trainerId'])
@Index('idx_batches_start', ['startDate'])
export class BatchEntity {
  @PrimaryGeneratedColumn({ type: 'int' })
  id!: number;

  @Column({ name: 'course_id', type: 'int', comment: '引用 courses.id' })
  courseId!: number;

  @ManyToOne(() => CourseEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'course_id' })
  course?: CourseEntity;

  /** 讲师（讲师删除时置空） */
  @Column({ name: 'trainer_id', type: 'int', nullable: true, comment: '引用 trainers.id' })
  trainerId!: number | null;

  @ManyToOne(() => TrainerEntity, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'trainer_id' })
  trainer?: TrainerEntity | null;

  @Column({ name: 'code', type: 'varchar', length: 20, comment: '班级编码' })
  code!: string;

  @Column({ name: 'start_date', type: 'date', comment: '开班日期' })
  startDate!: string;

  @Column({ name: 'end_date', type: 'date', comment: '结班日期' })
  endDate!: string;

  @Column({ name: 'capacity', type: 'int', unsigned: true, default: 10, comment: '容量' })
  capacity!: number;

  @Column({ name: 'schedule', type: 'json', nullable: true, comment: '上课安排' })
  schedule!: BatchSchedule | null;
}
