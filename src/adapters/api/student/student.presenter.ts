// src/adapters/api/student/student.presenter.ts
import type { EnquiryStatus } from '@app-types/models/student.types';
import type { EnquiryEntity } from '@modules/student/enquiry.entity';
import type { MeasurementEntity } from '@modules/student/measurement.entity';
import type { StudentEntity } from '@modules/student/student.entity';

export interface StudentView {
  readonly id: number;
  readonly userId: number;
  readonly username: string | null;
  readonly firstName: string | null;
  readonly lastName: string | null;
  readonly email: string | null;
  readonly phone: string | null;
  readonly regNo: string;
  readonly guardianName: string;
  readonly guardianPhone: string;
  readonly admissionDate: string;
  readonly address: string | null;
  readonly photo: string | null;
  readonly photoUrl: string | null;
  readonly active: boolean;
}

/**
 * @param urlFor 媒体相对路径 → 对外 URL
 */
export function toStudentView(
  student: StudentEntity,
  urlFor: (path: string | null) => string | null,
): StudentView {
  const user = student.user;
  return {
    id: student.id,
    userId: student.userId,
    username: user?.username ?? null,
    firstName: user?.firstName ?? null,
    lastName: user?.lastName ?? null,
    email: user?.email ?? null,
    phone: user?.phone ?? null,
    regNo: student.regNo,
    guardianName: student.guardianName,
    guardianPhone: student.guardianPhone,
    admissionDate: student.admissionDate,
    address: student.address,
    photo: student.photo,
    photoUrl: urlFor(student.photo),
    active: student.active,
  };
}

export interface EnquiryView {
  readonly id: number;
  readonly name: string;
  readonly phone: string;
  readonly email: string;
  readonly courseInterest: string;
  readonly source: string;
  readonly status: EnquiryStatus;
  readonly notes: string | null;
  readonly createdAt: Date;
}

export function toEnquiryView(e: EnquiryEntity): EnquiryView {
  return {
    id: e.id,
    name: e.name,
    phone: e.phone,
    email: e.email,
    courseInterest: e.courseInterest,
    source: e.source,
    status: e.status,
    notes: e.notes,
    createdAt: e.createdAt,
  };
}

export interface MeasurementView {
  readonly id: number;
  readonly studentId: number;
  readonly dateTaken: string;
  readonly neck: string | null;
  readonly chest: string | null;
  readonly waist: string | null;
  readonly hips: string | null;
  readonly sleeveLength: string | null;
  readonly inseam: string | null;
  readonly notes: string | null;
}

export function toMeasurementView(m: MeasurementEntity): MeasurementView {
  return {
    id: m.id,
    studentId: m.studentId,
    dateTaken: m.dateTaken,
    neck: m.neck,
    chest: m.chest,
    waist: m.waist,
    hips: m.hips,
    sleeveLength: m.sleeveLength,
    inseam: m.inseam,
    notes: m.notes,
  };
}
