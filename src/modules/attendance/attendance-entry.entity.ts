// src/modules/attendance/attendance-entry.entity.ts
import { AttendanceStatus } from '@app-types/models/attendance.types';
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
import { AttendanceEntity } from './attendance.entity';

/**
 * 考勤明细实体（每名学员一条）
 * 对应数据库表：attendance_entries
 */
@Entity('attendance_entries')
@Unique('uk_attendance_entries_student', ['attendanceId', 'studentId'])
@Index('idx_attendance_entries_student_status', ['studentId', 'status'])
export class AttendanceEntryEntity {
  @PrimaryGeneratedColumn({ type: 'int' })
  id!: number;

  @Column({ name: 'attendance_id', type: 'int', comment: '引用 attendances.id' })
  attendanceId!: number;

  @ManyToOne(() => AttendanceEntity, (attendance) => attendance.entries, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'attendance_id' })
  attendance?: AttendanceEntity;

  @Column({ name: 'student_id', type: 'int', comment: '引用 students.id' })
  studentId!: number;

  @ManyToOne(() => StudentEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'student_id' })
  student?: StudentEntity;

  @Column({
    name: 'status',
    type: 'enum',
    enum: AttendanceStatus,
    default: AttendanceStatus.PRESENT,
    comment: 'P=出勤，A=缺勤，L=请假',
  })
  status!: AttendanceStatus;
}
