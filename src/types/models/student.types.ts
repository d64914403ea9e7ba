// src/types/models/student.types.ts

/** 咨询状态 */
export enum EnquiryStatus {
  NEW = 'new',
  FOLLOW_UP = 'follow_up',
  CONVERTED = 'converted',
  CLOSED = 'closed',
}
