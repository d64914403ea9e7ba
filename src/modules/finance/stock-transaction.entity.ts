// src/modules/finance/stock-transaction.entity.ts
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
import { StockItemEntity } from './stock-item.entity';

/**
 * 库存流水实体（正数入库，负数出库）
 * 对应数据库表：stock_transactions
 */
@Entity('stock_transactions')
@Index('idx_stock_transactions_item_date', ['itemId', 'date'])
export class StockTransactionEntity {
  @PrimaryGeneratedColumn({ type: 'int' })
  id!: number;

  @Column({ name: 'item_id', type: 'int', comment: '引用 stock_items.id' })
  itemId!: number;

  @ManyToOne(() => StockItemEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'item_id' })
  item?: StockItemEntity;

  @CreateDateColumn({ name: 'date', type: 'datetime', comment: '发生时间' })
  date!: Date;

  @Column({
    name: 'quantity_changed',
    type: 'decimal',
    precision: 10,
    scale: 2,
    comment: '变动数量（带符号）',
  })
  quantityChanged!: string;

  @Column({ name: 'reason', type: 'varchar', length: 255, default: '', comment: '原因' })
  reason!: string;

  @Column({ name: 'user_id', type: 'int', nullable: true, comment: '操作人 users.id' })
  userId!: number | null;

  @ManyToOne(() => UserEntity, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'user_id' })
  user?: UserEntity | null;
}
