// src/adapters/api/certificate/certificate.presenter.ts
import type { CertificateEntity } from '@modules/certificate/certificate.entity';
import { certificateStudentName } from '@usecases/certificate/certificate-access.usecase';

export interface CertificateView {
  readonly id: number;
  readonly certificateNo: string;
  readonly studentId: number;
  readonly studentName: string;
  readonly courseId: number | null;
  readonly courseTitle: string | null;
  readonly issueDate: string;
  readonly qrHash: string;
  readonly remarks: string;
  readonly revoked: boolean;
  readonly pdfUrl: string | null;
}

export function toCertificateView(
  certificate: CertificateEntity,
  urlFor: (path: string | null) => string | null,
): CertificateView {
  return {
    id: certificate.id,
    certificateNo: certificate.certificateNo,
    studentId: certificate.studentId,
    studentName: certificateStudentName(certificate),
    courseId: certificate.courseId,
    courseTitle: certificate.course?.title ?? null,
    issueDate: certificate.issueDate,
    qrHash: certificate.qrHash,
    remarks: certificate.remarks,
    revoked: certificate.revoked,
    pdfUrl: urlFor(certificate.pdfFile),
  };
}
