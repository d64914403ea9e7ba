// src/modules/student/measurement.entity.ts
import { Column, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { StudentEntity } from './student.entity';

const measureColumn = (name: string, comment: string) =>
  Column({ name, type: 'decimal', precision: 5, scale: 2, nullable: true, comment });

/**
 * 量体记录实体
 * 对应数据库表：measurements
 * 尺寸为 DECIMAL(5,2)，以字符串读出
 */
@Entity('measurements')
@Index('idx_measurements_student_date', ['studentId', 'dateTaken'])
export class MeasurementEntity {
  @PrimaryGeneratedColumn({ type: 'int' })
  id!: number;

  @Column({ name: 'student_id', type: 'int', comment: '引用 students.id' })
  studentId!: number;

  @ManyToOne(() => StudentEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'student_id' })
  student?: StudentEntity;

  @Column({ name: 'date_taken', type: 'date', comment: '测量日期' })
  dateTaken!: string;

  @measureColumn('neck', '领围')
  neck!: string | null;

  @measureColumn('chest', '胸围')
  chest!: string | null;

  @measureColumn('waist', '腰围')
  waist!: string | null;

  @measureColumn('hips', '臀围')
  hips!: string | null;

  @measureColumn('sleeve_length', '袖长')
  sleeveLength!: string | null;

  @measureColumn('inseam', '内缝长')
  inseam!: string | null;

  @Column({ name: 'notes', type: 'text', nullable: true, comment: '备注' })
  notes!: string | null;
}

export const MEASUREMENT_FIELDS = [
  'neck',
  'chest',
  'waist',
  'hips',
  'sleeveLength',
  'inseam',
] as const;
export type MeasurementField = (typeof MEASUREMENT_FIELDS)[number];
