// src/modules/student/enquiry.entity.ts
import { EnquiryStatus } from '@app-types/models/student.types';
import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

/**
 * 咨询登记实体
 * 对应数据库表：enquiries
 */
@Entity('enquiries')
@Index('idx_enquiries_status', ['status'])
@Index('idx_enquiries_created', ['createdAt'])
export class EnquiryEntity {
  @PrimaryGeneratedColumn({ type: 'int' })
  id!: number;

  @Column({ name: 'name', type: 'varchar', length: 100, comment: '咨询人姓名' })
  name!: string;

  @Column({ name: 'phone', type: 'varchar', length: 15, comment: '联系电话' })
  phone!: string;

  @Column({ name: 'email', type: 'varchar', length: 254, default: '', comment: '邮箱' })
  email!: string;

  @Column({ name: 'course_interest', type: 'varchar', length: 100, comment: '意向课程' })
  courseInterest!: string;

  @Column({ name: 'source', type: 'varchar', length: 50, default: '', comment: '来源渠道' })
  source!: string;

  @Column({
    name: 'status',
    type: 'enum',
    enum: EnquiryStatus,
    default: EnquiryStatus.NEW,
    comment: '咨询状态',
  })
  status!: EnquiryStatus;

  @Column({ name: 'notes', type: 'text', nullable: true, comment: '跟进备注' })
  notes!: string | null;

  @CreateDateColumn({ name: 'created_at', type: 'timestamp', comment: '登记时间' })
  createdAt!: Date;
}
