// src/modules/certificate/certificate.service.ts
import { CERTIFICATE_ERROR, DomainError } from '@core/common/errors/domain-error';
import { isUniqueConstraintViolation } from '@core/database/unique-violation';
import { columnResolver } from '@core/search/column-map';
import type { SearchParams, SearchResult } from '@core/search/search.types';
import { SearchService } from '@modules/common/search.module';
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { randomUUID } from 'crypto';
import { EntityManager, Repository } from 'typeorm';
import { CertificateEntity } from './certificate.entity';

export interface CertificateData {
  readonly certificateNo: string;
  readonly studentId: number;
  readonly courseId: number;
  readonly issueDate: string;
  readonly remarks?: string;
}

const CERTIFICATE_RELATIONS = { student: { user: true }, course: true } as const;

/**
 * 证书服务
 */
@Injectable()
export class CertificateService {
  constructor(
    @InjectRepository(CertificateEntity)
    private readonly certificateRepository: Repository<CertificateEntity>,
    private readonly searchService: SearchService,
  ) {}

  private repo(manager?: EntityManager): Repository<CertificateEntity> {
    return manager ? manager.getRepository(CertificateEntity) : this.certificateRepository;
  }

  async findById(id: number): Promise<CertificateEntity | null> {
    return this.certificateRepository.findOne({ where: { id }, relations: CERTIFICATE_RELATIONS });
  }

  async getOrThrow(id: number): Promise<CertificateEntity> {
    const certificate = await this.findById(id);
    if (!certificate) {
      throw new DomainError(CERTIFICATE_ERROR.CERTIFICATE_NOT_FOUND, 'Certificate not found.', { id });
    }
    return certificate;
  }

  async findByQrHash(qrHash: string): Promise<CertificateEntity | null> {
    return this.certificateRepository.findOne({ where: { qrHash }, relations: CERTIFICATE_RELATIONS });
  }

  async search(params: SearchParams): Promise<SearchResult<CertificateEntity>> {
    return this.searchService.search({
      qb: this.certificateRepository
        .createQueryBuilder('certificate')
        .leftJoinAndSelect('certificate.student', 'student')
        .leftJoinAndSelect('student.user', 'user')
        .leftJoinAndSelect('certificate.course', 'course'),
      params,
      options: {
        searchColumns: ['certificate.certificateNo', 'student.regNo'],
        allowedFilters: ['revoked', 'courseId', 'studentId'],
        resolveColumn: columnResolver({
          revoked: 'certificate.revoked',
          courseId: 'certificate.courseId',
          studentId: 'certificate.studentId',
          issueDate: 'certificate.issueDate',
          id: 'certificate.id',
        }),
        allowedSorts: ['issueDate', 'id'],
        defaultSorts: [
          { field: 'issueDate', direction: 'DESC' },
          { field: 'id', direction: 'DESC' },
        ],
      },
    });
  }

  /** 学员未吊销的证书，最新在前 */
  async findValidByStudent(studentId: number): Promise<CertificateEntity[]> {
    return this.certificateRepository.find({
      where: { studentId, revoked: false },
      relations: CERTIFICATE_RELATIONS,
      order: { issueDate: 'DESC', id: 'DESC' },
    });
  }

  /** 学员在课程下是否已有未吊销证书 */
  async findValid(
    studentId: number,
    courseId: number,
    manager?: EntityManager,
  ): Promise<CertificateEntity | null> {
    return this.repo(manager).findOne({ where: { studentId, courseId, revoked: false } });
  }

  /** 以 prefix 开头的最大证书编号；先比长度，序号超出补零位数时仍有序 */
  async findLastCertificateNo(prefix: string, manager?: EntityManager): Promise<string | null> {
    const row = await this.repo(manager)
      .createQueryBuilder('certificate')
      .select('certificate.certificateNo', 'certificateNo')
      .where('certificate.certificateNo LIKE :prefix', { prefix: `${prefix}%` })
      .orderBy('LENGTH(certificate.certificateNo)', 'DESC')
      .addOrderBy('certificate.certificateNo', 'DESC')
      .limit(1)
      .getRawOne<{ certificateNo: string }>();
    return row?.certificateNo ?? null;
  }

  async create(data: CertificateData, manager?: EntityManager): Promise<CertificateEntity> {
    const repo = this.repo(manager);
    const certificate = repo.create({
      certificateNo: data.certificateNo,
      studentId: data.studentId,
      courseId: data.courseId,
      issueDate: data.issueDate,
      qrHash: randomUUID(),
      remarks: data.remarks ?? '',
      revoked: false,
      pdfFile: null,
    });
    try {
      return await repo.save(certificate);
    } catch (error) {
      if (isUniqueConstraintViolation(error)) {
        // 并发签发抢到同一编号
        throw new DomainError(
          CERTIFICATE_ERROR.CERTIFICATE_NO_ALREADY_EXISTS,
          'Certificate number already exists. Please retry.',
          { certificateNo: data.certificateNo },
          error,
        );
      }
      throw error;
    }
  }

  async update(
    certificate: CertificateEntity,
    patch: { readonly remarks?: string; readonly revoked?: boolean; readonly pdfFile?: string | null },
  ): Promise<CertificateEntity> {
    await this.certificateRepository.save(this.certificateRepository.merge(certificate, patch));
    return this.getOrThrow(certificate.id);
  }

  async remove(id: number): Promise<void> {
    await this.certificateRepository.remove(await this.getOrThrow(id));
  }
}
