// src/modules/course/course.entity.ts
import { Column, Entity, PrimaryGeneratedColumn, Unique } from 'typeorm';

/**
 * 课程实体
 * 对应数据库表：courses
 */
@Entity('courses')
@Unique('uk_courses_code', ['code'])
export class CourseEntity {
  @PrimaryGeneratedColumn({ type: 'int' })
  id!: number;

  @Column({ name: 'code', type: 'varchar', length: 20, comment: '课程编码' })
  code!: string;

  @Column({ name: 'title', type: 'varchar', length: 100, comment: '课程名称' })
  title!: string;

  @Column({ name: 'duration_weeks', type: 'int', unsigned: true, comment: '课程周数' })
  durationWeeks!: number;

  /** 总学费 DECIMAL(10,2) */
  @Column({ name: 'total_fees', type: 'decimal', precision: 10, scale: 2, comment: '总学费' })
  totalFees!: string;

  @Column({ name: 'syllabus', type: 'text', nullable: true, comment: '教学大纲' })
  syllabus!: string | null;

  @Column({ name: 'active', type: 'boolean', default: true, comment: '是否开放' })
  active!: boolean;

  /** 结业所需出勤天数；0 表示不自动结业 */
  @Column({
    name: 'required_attendance_days',
    type: 'int',
    unsigned: true,
    default: 0,
    comment: '结业所需出勤天数',
  })
  requiredAttendanceDays!: number;
}
