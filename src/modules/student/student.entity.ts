// src/modules/student/student.entity.ts
import { UserEntity } from '@modules/account/user.entity';
import { Column, Entity, Index, JoinColumn, OneToOne, PrimaryGeneratedColumn, Unique } from 'typeorm';

/**
 * 学员档案实体
 * 对应数据库表：students
 * 与 users 一对一
 */
@Entity('students')
@Unique('uk_students_reg_no', ['regNo'])
@Unique('uk_students_user', ['userId'])
@Index('idx_students_admission', ['admissionDate'])
export class StudentEntity {
  @PrimaryGeneratedColumn({ type: 'int' })
  id!: number;

  @Column({ name: 'user_id', type: 'int', comment: '引用 users.id' })
  userId!: number;

  @OneToOne(() => UserEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'user_id' })
  user?: UserEntity;

  @Column({ name: 'reg_no', type: 'varchar', length: 30, comment: '学号，如 STU2024-001' })
  regNo!: string;

  @Column({ name: 'guardian_name', type: 'varchar', length: 100, default: '', comment: '监护人' })
  guardianName!: string;

  @Column({ name: 'guardian_phone', type: 'varchar', length: 15, default: '', comment: '监护人电话' })
  guardianPhone!: string;

  /** 入学日期（YYYY-MM-DD） */
  @Column({ name: 'admission_date', type: 'date', comment: '入学日期' })
  admissionDate!: string;

  @Column({ name: 'address', type: 'text', nullable: true, comment: '地址' })
  address!: string | null;

  /** 照片相对路径（媒体根目录下） */
  @Column({ name: 'photo', type: 'varchar', length: 255, nullable: true, comment: '照片路径' })
  photo!: string | null;

  @Column({ name: 'active', type: 'boolean', default: true, comment: '是否在读' })
  active!: boolean;
}
