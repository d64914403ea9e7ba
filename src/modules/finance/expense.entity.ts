// src/modules/finance/expense.entity.ts
import { ExpenseCategory } from '@app-types/models/finance.types';
import { UserEntity } from '@modules/account/user.entity';
import { Column, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';

/**
 * 支出实体
 * 对应数据库表：expenses
 */
@Entity('expenses')
@Index('idx_expenses_date', ['date'])
export class ExpenseEntity {
  @PrimaryGeneratedColumn({ type: 'int' })
  id!: number;

  @Column({ name: 'date', type: 'date', comment: '支出日期' })
  date!: string;

  @Column({ name: 'description', type: 'varchar', length: 255, comment: '说明' })
  description!: string;

  @Column({ name: 'category', type: 'enum', enum: ExpenseCategory, comment: '类别' })
  category!: ExpenseCategory;

  @Column({ name: 'amount', type: 'decimal', precision: 10, scale: 2, comment: '金额' })
  amount!: string;

  @Column({ name: 'added_by', type: 'int', nullable: true, comment: '录入人 users.id' })
  addedById!: number | null;

  @ManyToOne(() => UserEntity, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'added_by' })
  addedBy?: UserEntity | null;
}
