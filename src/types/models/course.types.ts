// src/types/models/course.types.ts

/** 报名状态 */
export enum EnrollmentStatus {
  ACTIVE = 'active',
  COMPLETED = 'completed',
  DROPPED = 'dropped',
}

/** 班级上课安排，如 { "Mon": "9-11", "Wed": "1-3" } */
export type BatchSchedule = Record<string, string>;
