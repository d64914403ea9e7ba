// src/modules/certificate/certificate.service.spec.ts
import { CERTIFICATE_ERROR } from '@core/common/errors/domain-error';
import { resolveHttpStatus } from '@core/common/errors/error-status';
import { SearchService } from '@modules/common/search.module';
import { HttpStatus } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { CertificateEntity } from './certificate.entity';
import { CertificateService } from './certificate.service';

describe('CertificateService', () => {
  const builder = {
    select: jest.fn(),
    where: jest.fn(),
    orderBy: jest.fn(),
    addOrderBy: jest.fn(),
    limit: jest.fn(),
    getRawOne: jest.fn(),
  };
  const repository = {
    create: jest.fn(),
    save: jest.fn(),
    createQueryBuilder: jest.fn(),
  };
  const data = { certificateNo: 'CERT-20240601-0004', studentId: 7, courseId: 3, issueDate: '2024-06-01' };
  let service: CertificateService;

  beforeEach(async () => {
    repository.create.mockImplementation((value: Partial<CertificateEntity>) => ({ ...value }));
    repository.createQueryBuilder.mockReturnValue(builder);
    builder.select.mockReturnValue(builder);
    builder.where.mockReturnValue(builder);
    builder.orderBy.mockReturnValue(builder);
    builder.addOrderBy.mockReturnValue(builder);
    builder.limit.mockReturnValue(builder);
    const moduleRef = await Test.createTestingModule({
      providers: [
        CertificateService,
        { provide: getRepositoryToken(CertificateEntity), useValue: repository },
        { provide: SearchService, useValue: {} },
      ],
    }).compile();
    service = moduleRef.get(CertificateService);
  });

  it('取当日最大证书编号，删除记录后不回退', async () => {
    builder.getRawOne.mockResolvedValue({ certificateNo: 'CERT-20240601-0003' });

    await expect(service.findLastCertificateNo('CERT-20240601-')).resolves.toBe('CERT-20240601-0003');
    expect(builder.where).toHaveBeenCalledWith('certificate.certificateNo LIKE :prefix', {
      prefix: 'CERT-20240601-%',
    });
    expect(builder.orderBy).toHaveBeenCalledWith('LENGTH(certificate.certificateNo)', 'DESC');
  });

  it('当日尚无证书时返回 null', async () => {
    builder.getRawOne.mockResolvedValue(undefined);

    await expect(service.findLastCertificateNo('CERT-20240602-')).resolves.toBeNull();
  });

  it('新证书带 qrHash 且未作废', async () => {
    repository.save.mockImplementation((value: Partial<CertificateEntity>) =>
      Promise.resolve({ id: 9, ...value }),
    );

    const saved = await service.create(data);

    expect(saved).toMatchObject({
      id: 9,
      certificateNo: 'CERT-20240601-0004',
      remarks: '',
      revoked: false,
      pdfFile: null,
    });
    expect(saved.qrHash).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('证书编号唯一约束冲突转为 409 领域错误', async () => {
    const duplicate = Object.assign(new Error('Duplicate entry'), { driverError: { errno: 1062 } });
    repository.save.mockRejectedValue(duplicate);

    const error = await service.create(data).catch((e: unknown) => e);

    expect(error).toMatchObject({
      code: CERTIFICATE_ERROR.CERTIFICATE_NO_ALREADY_EXISTS,
      message: 'Certificate number already exists. Please retry.',
      details: { certificateNo: 'CERT-20240601-0004' },
      cause: duplicate,
    });
    expect(resolveHttpStatus(CERTIFICATE_ERROR.CERTIFICATE_NO_ALREADY_EXISTS)).toBe(HttpStatus.CONFLICT);
  });
});
