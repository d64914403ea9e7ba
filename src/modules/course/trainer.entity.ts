// src/modules/course/trainer.entity.ts
import { UserEntity } from '@modules/account/user.entity';
import { Column, Entity, JoinColumn, OneToOne, PrimaryGeneratedColumn, Unique } from 'typeorm';

/**
 * 讲师实体
 * 对应数据库表：trainers
 */
@Entity('trainers')
@Unique('uk_trainers_emp_no', ['empNo'])
@Unique('uk_trainers_user', ['userId'])
export class TrainerEntity {
  @PrimaryGeneratedColumn({ type: 'int' })
  id!: number;

  @Column({ name: 'user_id', type: 'int', comment: '引用 users.id' })
  userId!: number;

  @OneToOne(() => UserEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'user_id' })
  user?: UserEntity;

  @Column({ name: 'emp_no', type: 'varchar', length: 20, comment: '工号' })
  empNo!: string;

  @Column({ name: 'join_date', type: 'date', comment: '入职日期' })
  joinDate!: string;

  @Column({
    name: 'salary',
    type: 'decimal',
    precision: 10,
    scale: 2,
    default: '0.00',
    comment: '月薪',
  })
  salary!: string;

  @Column({ name: 'is_active', type: 'boolean', default: true, comment: '是否在职' })
  isActive!: boolean;
}
