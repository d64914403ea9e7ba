// src/usecases/certificate/certificate-access.usecase.spec.ts
import { type UsecaseSession } from '@app-types/auth/session.types';
import { CERTIFICATE_ERROR } from '@core/common/errors/domain-error';
import { CertificateService } from '@modules/certificate/certificate.service';
import { StudentService } from '@modules/student/student.service';
import { Test } from '@nestjs/testing';
import { MediaStorageService } from '@src/infrastructure/storage/media-storage.service';
import { PinoLogger } from 'nestjs-pino';
import {
  CertificateAccessUsecase,
  DOWNLOAD_FORBIDDEN_MESSAGE,
  PDF_NOT_FOUND_MESSAGE,
} from './certificate-access.usecase';

describe('CertificateAccessUsecase', () => {
  const certificateService = {
    getOrThrow: jest.fn(),
    update: jest.fn(),
    findByQrHash: jest.fn(),
    findValidByStudent: jest.fn(),
  };
  const studentService = { getByUserIdOrThrow: jest.fn() };
  const storage = { exists: jest.fn(), read: jest.fn() };
  const logger = { setContext: jest.fn(), info: jest.fn() };
  const owner: UsecaseSession = { accountId: 20, username: 'meena', roles: ['STUDENT'] };
  const stranger: UsecaseSession = { accountId: 21, username: 'ravi', roles: ['STUDENT'] };
  const certificate = {
    id: 55,
    certificateNo: 'CERT-20240601-0003',
    issueDate: '2024-06-01',
    remarks: 'Distinction',
    revoked: false,
    pdfFile: 'certificates/pdfs/CERT-20240601-0003.pdf',
    student: { userId: 20, user: { firstName: 'Meena', lastName: 'Rao', username: 'meena' } },
    course: { title: 'Basic Tailoring' },
  };
  let usecase: CertificateAccessUsecase;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        CertificateAccessUsecase,
        { provide: CertificateService, useValue: certificateService },
        { provide: StudentService, useValue: studentService },
        { provide: MediaStorageService, useValue: storage },
        { provide: PinoLogger, useValue: logger },
      ],
    }).compile();
    usecase = moduleRef.get(CertificateAccessUsecase);
  });

  it('吊销与取消吊销交替', async () => {
    certificateService.getOrThrow.mockResolvedValue(certificate);
    certificateService.update.mockResolvedValue({ ...certificate, revoked: true });

    await expect(usecase.toggleRevoke(55)).resolves.toEqual({
      detail: 'Certificate has been revoked.',
      revoked: true,
    });
    expect(certificateService.update).toHaveBeenCalledWith(certificate, { revoked: true });
  });

  it('非本人学员不能下载', async () => {
    certificateService.getOrThrow.mockResolvedValue(certificate);

    await expect(usecase.download(stranger, 55)).rejects.toMatchObject({
      code: CERTIFICATE_ERROR.DOWNLOAD_FORBIDDEN,
      message: DOWNLOAD_FORBIDDEN_MESSAGE,
    });
  });

  it('文件缺失时返回未找到', async () => {
    certificateService.getOrThrow.mockResolvedValue(certificate);
    storage.exists.mockResolvedValue(false);

    await expect(usecase.download(owner, 55)).rejects.toMatchObject({
      code: CERTIFICATE_ERROR.PDF_NOT_FOUND,
      message: PDF_NOT_FOUND_MESSAGE,
    });
  });

  it('本人下载读取存储中的文件', async () => {
    certificateService.getOrThrow.mockResolvedValue(certificate);
    storage.exists.mockResolvedValue(true);
    storage.read.mockResolvedValue(Buffer.from('pdf'));

    const file = await usecase.download(owner, 55);

    expect(file.fileName).toBe('CERT-20240601-0003.pdf');
    expect(file.content.toString()).toBe('pdf');
    expect(storage.read).toHaveBeenCalledWith('certificates/pdfs/CERT-20240601-0003.pdf');
  });

  it('校验有效证书返回公开信息', async () => {
    certificateService.findByQrHash.mockResolvedValue(certificate);

    await expect(usecase.verify('hash-1')).resolves.toEqual({
      valid: true,
      certificateNo: 'CERT-20240601-0003',
      studentName: 'Meena Rao',
      courseTitle: 'Basic Tailoring',
      issueDate: '2024-06-01',
      remarks: 'Distinction',
    });
  });

  it('已吊销证书校验为空', async () => {
    certificateService.findByQrHash.mockResolvedValue({ ...certificate, revoked: true });

    await expect(usecase.verify('hash-1')).resolves.toBeNull();
  });
});
