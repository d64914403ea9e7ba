// src/modules/finance/payroll.entity.ts
import { DEFAULT_PAYROLL_STATUS, PayrollBreakdown } from '@app-types/models/finance.types';
import { TrainerEntity } from '@modules/course/trainer.entity';
import {
  Column,
  CreateDateColumn,
  Entity,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  Unique,
} from 'typeorm';

/**
 * 工资单实体（讲师 + 月份唯一）
 * 对应数据库表：payrolls
 */
@Entity('payrolls')
@Unique('uk_payrolls_trainer_month', ['trainerId', 'month'])
export class PayrollEntity {
  @PrimaryGeneratedColumn({ type: 'int' })
  id!: number;

  /** YYYY-MM */
  @Column({ name: 'month', type: 'varchar', length: 7, comment: '月份 YYYY-MM' })
  month!: string;

  @Column({ name: 'trainer_id', type: 'int', comment: '引用 trainers.id' })
  trainerId!: number;

  @ManyToOne(() => TrainerEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'trainer_id' })
  trainer?: TrainerEntity;

  @Column({ name: 'earnings', type: 'json', comment: '收入明细' })
  earnings!: PayrollBreakdown;

  @Column({ name: 'deductions', type: 'json', comment: '扣款明细' })
  deductions!: PayrollBreakdown;

  @Column({ name: 'net_pay', type: 'decimal', precision: 10, scale: 2, comment: '实发' })
  netPay!: string;

  @Column({
    name: 'status',
    type: 'varchar',
    length: 20,
    default: DEFAULT_PAYROLL_STATUS,
    comment: '发放状态',
  })
  status!: string;

  @CreateDateColumn({ name: 'created_at', type: 'timestamp', comment: '创建时间' })
  createdAt!: Date;
}
