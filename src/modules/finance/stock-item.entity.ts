// src/modules/finance/stock-item.entity.ts
import { Column, Entity, PrimaryGeneratedColumn, Unique } from 'typeorm';

/**
 * 库存物料实体
 * 对应数据库表：stock_items
 */
@Entity('stock_items')
@Unique('uk_stock_items_name', ['name'])
export class StockItemEntity {
  @PrimaryGeneratedColumn({ type: 'int' })
  id!: number;

  @Column({ name: 'name', type: 'varchar', length: 150, comment: '物料名称' })
  name!: string;

  @Column({ name: 'description', type: 'text', nullable: true, comment: '说明' })
  description!: string | null;

  @Column({ name: 'unit_of_measure', type: 'varchar', length: 20, default: 'pcs', comment: '计量单位' })
  unitOfMeasure!: string;

  @Column({
    name: 'quantity_on_hand',
    type: 'decimal',
    precision: 10,
    scale: 2,
    default: '0.00',
    comment: '现有数量',
  })
  quantityOnHand!: string;

  @Column({
    name: 'reorder_level',
    type: 'decimal',
    precision: 10,
    scale: 2,
    default: '0.00',
    comment: '补货阈值',
  })
  reorderLevel!: string;
}
