// src/modules/certificate/certificate.entity.ts
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
 * 结业证书实体
 * 对应数据库表：certificates
 * 同一学员同一课程的“有效证书”唯一性由用例校验（撤销后允许重新签发）
 */
@Entity('certificates')
@Unique('uk_certificates_no', ['certificateNo'])
@Unique('uk_certificates_qr_hash', ['qrHash'])
@Index('idx_certificates_student_course', ['studentId', 'courseId'])
@Index('idx_certificates_issue_date', ['issueDate'])
export class CertificateEntity {
  @PrimaryGeneratedColumn({ type: 'int' })
  id!: number;

  @Column({ name: 'certificate_no', type: 'varchar', length: 30, comment: '证书编号' })
  certificateNo!: string;

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

  @Column({ name: 'issue_date', type: 'date', comment: '签发日期' })
  issueDate!: string;

  /** 校验哈希（uuid v4） */
  @Column({ name: 'qr_hash', type: 'char', length: 36, comment: '校验哈希' })
  qrHash!: string;

  @Column({ name: 'remarks', type: 'varchar', length: 255, default: '', comment: '备注' })
  remarks!: string;

  @Column({ name: 'revoked', type: 'boolean', default: false, comment: '是否撤销' })
  revoked!: boolean;

  @Column({ name: 'pdf_file', type: 'varchar', length: 255, nullable: true, comment: 'PDF 路径' })
  pdfFile!: string | null;
}
