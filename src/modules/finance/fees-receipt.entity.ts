// src/modules/finance/fees-receipt.entity.ts
import { PaymentMode } from '@app-types/models/finance.types';
import { UserEntity } from '@modules/account/user.entity';
import { BatchEntity } from '@modules/course/batch.entity';
import { CourseEntity } from '@modules/course/course.entity';
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

/**
 * 收费收据实体
 * 对应数据库表：fees_receipts
 * locked=true 后不可修改或删除
 */
@Entity('fees_receipts')
@Unique('uk_fees_receipts_no', ['receiptNo'])
@Index('idx_fees_receipts_student_course', ['studentId', 'courseId'])
@Index('idx_fees_receipts_date', ['date'])
export class FeesReceiptEntity {
  @PrimaryGeneratedColumn({ type: 'int' })
  id!: number;

  @Column({ name: 'receipt_no', type: 'varchar', length: 30, comment: '收据号，如 RCP-000001' })
  receiptNo!: string;

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

  @Column({ name: 'amount', type: 'decimal', precision: 10, scale: 2, comment: '金额' })
  amount!: string;

  @Column({ name: 'mode', type: 'enum', enum: PaymentMode, comment: '缴费方式' })
  mode!: PaymentMode;

  @Column({ name: 'txn_id', type: 'varchar', length: 50, default: '', comment: '交易流水号' })
  txnId!: string;

  @Column({ name: 'date', type: 'date', comment: '收款日期' })
  date!: string;

  @Column({ name: 'posted_by', type: 'int', nullable: true, comment: '经办人 users.id' })
  postedById!: number | null;

  @ManyToOne(() => UserEntity, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'posted_by' })
  postedBy?: UserEntity | null;

  @Column({ name: 'locked', type: 'boolean', default: false, comment: '是否锁定' })
  locked!: boolean;

  @Column({ name: 'pdf_file', type: 'varchar', length: 255, nullable: true, comment: 'PDF 路径' })
  pdfFile!: string | null;
}
