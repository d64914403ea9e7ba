// src/modules/attendance/attendance.entity.ts
import { UserEntity } from '@modules/account/user.entity';
import { BatchEntity } from '@modules/course/batch.entity';
import {
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  OneToMany,
  PrimaryGeneratedColumn,
  Unique,
} from 'typeorm';
import { AttendanceEntryEntity } from './attendance-entry.entity';

/**
 * 考勤记录实体（一个班级一天一条）
 * 对应数据库表：attendances
 */
@Entity('attendances')
@Unique('uk_attendances_batch_date', ['batchId', 'date'])
@Index('idx_attendances_date', ['date'])
export class AttendanceEntity {
  @PrimaryGeneratedColumn({ type: 'int' })
  id!: number;

  @Column({ name: 'batch_id', type: 'int', comment: '引用 batches.id' })
  batchId!: number;

  @ManyToOne(() => BatchEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'batch_id' })
  batch?: BatchEntity;

  @Column({ name: 'date', type: 'date', comment: '考勤日期' })
  date!: string;

  @Column({ name: 'taken_by', type: 'int', nullable: true, comment: '点名人 users.id' })
  takenById!: number | null;

  @ManyToOne(() => UserEntity, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'taken_by' })
  takenBy?: UserEntity | null;

  @Column({ name: 'remarks', type: 'text', nullable: true, comment: '备注' })
  remarks!: string | null;

  @OneToMany(() => AttendanceEntryEntity, (entry) => entry.attendance)
  entries?: AttendanceEntryEntity[];
}
