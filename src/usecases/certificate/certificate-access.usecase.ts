// src/usecases/certificate/certificate-access.usecase.ts
import { type UsecaseSession, isStaffSession } from '@app-types/auth/session.types';
import { CERTIFICATE_ERROR, DomainError } from '@core/common/errors/domain-error';
import { fullName } from '@modules/account/user.entity';
import { CertificateEntity } from '@modules/certificate/certificate.entity';
import { CertificateService } from '@modules/certificate/certificate.service';
import { StudentService } from '@modules/student/student.service';
import { Injectable } from '@nestjs/common';
import { MediaStorageService } from '@src/infrastructure/storage/media-storage.service';
import { PinoLogger } from 'nestjs-pino';

export const DOWNLOAD_FORBIDDEN_MESSAGE = 'Not authorized to download this file.';
export const PDF_NOT_FOUND_MESSAGE = 'PDF file not found for this certificate.';
export const NOT_FOUND_OR_REVOKED_MESSAGE = 'Certificate not found or revoked.';

export interface CertificateVerification {
  readonly valid: true;
  readonly certificateNo: string;
  readonly studentName: string;
  readonly courseTitle: string;
  readonly issueDate: string;
  readonly remarks: string;
}

export interface CertificateFile {
  readonly fileName: string;
  readonly content: Buffer;
}

/** 学员姓名（无姓名时退回用户名） */
export function certificateStudentName(certificate: CertificateEntity): string {
  const user = certificate.student?.user;
  return user ? fullName(user) || user.username : '';
}

/**
 * 证书查询、下载、校验与吊销
 */
@Injectable()
export class CertificateAccessUsecase {
  constructor(
    private readonly certificateService: CertificateService,
    private readonly studentService: StudentService,
    private readonly storage: MediaStorageService,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(CertificateAccessUsecase.name);
  }

  /** 吊销状态取反 */
  async toggleRevoke(id: number): Promise<{ detail: string; revoked: boolean }> {
    const certificate = await this.certificateService.getOrThrow(id);
    const saved = await this.certificateService.update(certificate, { revoked: !certificate.revoked });
    this.logger.info({ certificateId: id, revoked: saved.revoked }, '证书吊销状态已切换');
    return {
      detail: saved.revoked ? 'Certificate has been revoked.' : 'Certificate has been un-revoked.',
      revoked: saved.revoked,
    };
  }

  /** 学员本人或员工 */
  async download(session: UsecaseSession, id: number): Promise<CertificateFile> {
    const certificate = await this.certificateService.getOrThrow(id);
    const isOwner = certificate.student?.userId === session.accountId;
    if (!isOwner && !isStaffSession(session)) {
      throw new DomainError(CERTIFICATE_ERROR.DOWNLOAD_FORBIDDEN, DOWNLOAD_FORBIDDEN_MESSAGE, { id });
    }
    if (!certificate.pdfFile || !(await this.storage.exists(certificate.pdfFile))) {
      throw new DomainError(CERTIFICATE_ERROR.PDF_NOT_FOUND, PDF_NOT_FOUND_MESSAGE, { id });
    }
    return {
      fileName: `${certificate.certificateNo}.pdf`,
      content: await this.storage.read(certificate.pdfFile),
    };
  }

  /** 公开校验；不存在或已吊销时返回 null */
  async verify(qrHash: string): Promise<CertificateVerification | null> {
    const certificate = await this.certificateService.findByQrHash(qrHash);
    if (!certificate || certificate.revoked) return null;
    return {
      valid: true,
      certificateNo: certificate.certificateNo,
      studentName: certificateStudentName(certificate),
      courseTitle: certificate.course?.title ?? '',
      issueDate: certificate.issueDate,
      remarks: certificate.remarks,
    };
  }

  async mine(session: UsecaseSession): Promise<CertificateEntity[]> {
    const student = await this.studentService.getByUserIdOrThrow(session.accountId);
    return this.certificateService.findValidByStudent(student.id);
  }
}
