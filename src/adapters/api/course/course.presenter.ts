// src/adapters/api/course/course.presenter.ts
import type { BatchSchedule, EnrollmentStatus } from '@app-types/models/course.types';
import { displayName, fullName } from '@modules/account/user.entity';
import type { BatchEntity } from '@modules/course/batch.entity';
import type { CourseEntity } from '@modules/course/course.entity';
import type { EnrollmentEntity } from '@modules/course/enrollment.entity';
import type { TrainerEntity } from '@modules/course/trainer.entity';

export interface CourseView {
  readonly id: number;
  readonly code: string;
  readonly title: string;
  readonly durationWeeks: number;
  readonly totalFees: string;
  readonly syllabus: string | null;
  readonly active: boolean;
  readonly requiredAttendanceDays: number;
}

export function toCourseView(course: CourseEntity): CourseView {
  return {
    id: course.id,
    code: course.code,
    title: course.title,
    durationWeeks: course.durationWeeks,
    totalFees: course.totalFees,
    syllabus: course.syllabus,
    active: course.active,
    requiredAttendanceDays: course.requiredAttendanceDays,
  };
}

export interface TrainerView {
  readonly id: number;
  readonly userId: number;
  readonly empNo: string;
  readonly joinDate: string;
  readonly salary: string;
  readonly isActive: boolean;
  readonly trainerName: string;
}

export function toTrainerView(trainer: TrainerEntity): TrainerView {
  return {
    id: trainer.id,
    userId: trainer.userId,
    empNo: trainer.empNo,
    joinDate: trainer.joinDate,
    salary: trainer.salary,
    isActive: trainer.isActive,
    trainerName: trainer.user ? displayName(trainer.user) : '',
  };
}

export interface BatchView {
  readonly id: number;
  readonly courseId: number;
  readonly courseTitle: string | null;
  readonly trainerId: number | null;
  readonly trainerName: string | null;
  readonly code: string;
  readonly startDate: string;
  readonly endDate: string;
  readonly capacity: number;
  readonly schedule: BatchSchedule | null;
}

export function toBatchView(batch: BatchEntity): BatchView {
  const trainerUser = batch.trainer?.user;
  return {
    id: batch.id,
    courseId: batch.courseId,
    courseTitle: batch.course?.title ?? null,
    trainerId: batch.trainerId,
    trainerName: trainerUser ? displayName(trainerUser) : null,
    code: batch.code,
    startDate: batch.startDate,
    endDate: batch.endDate,
    capacity: batch.capacity,
    schedule: batch.schedule,
  };
}

export interface EnrollmentView {
  readonly id: number;
  readonly studentId: number;
  readonly studentName: string;
  readonly regNo: string | null;
  readonly batchId: number;
  readonly batchCode: string | null;
  readonly courseTitle: string | null;
  readonly enrolledOn: string;
  readonly status: EnrollmentStatus;
  readonly presentDays: number;
}

export function toEnrollmentView(enrollment: EnrollmentEntity, presentDays: number): EnrollmentView {
  const student = enrollment.student;
  return {
    id: enrollment.id,
    studentId: enrollment.studentId,
    studentName: student?.user ? fullName(student.user) : '',
    regNo: student?.regNo ?? null,
    batchId: enrollment.batchId,
    batchCode: enrollment.batch?.code ?? null,
    courseTitle: enrollment.batch?.course?.title ?? null,
    enrolledOn: enrollment.enrolledOn,
    status: enrollment.status,
    presentDays,
  };
}
