// src/modules/course/enrollment.service.ts
import { EnrollmentStatus } from '@app-types/models/course.types';
import { COURSE_ERROR, DomainError } from '@core/common/errors/domain-error';
import { isUniqueConstraintViolation } from '@core/database/unique-violation';
import { columnResolver } from '@core/search/column-map';
import type { SearchParams, SearchResult } from '@core/search/search.types';
import { SearchService } from '@modules/common/search.module';
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, In, Repository } from 'typeorm';
import { EnrollmentEntity } from './enrollment.entity';

const ENROLLMENT_RELATIONS = { student: { user: true }, batch: { course: true } } as const;

/**
 * 报名服务
 */
@Injectable()
export class EnrollmentService {
  constructor(
    @InjectRepository(EnrollmentEntity)
    private readonly enrollmentRepository: Repository<EnrollmentEntity>,
    private readonly searchService: SearchService,
  ) {}

  private repo(manager?: EntityManager): Repository<EnrollmentEntity> {
    return manager ? manager.getRepository(EnrollmentEntity) : this.enrollmentRepository;
  }

  async findById(id: number): Promise<EnrollmentEntity | null> {
    return this.enrollmentRepository.findOne({ where: { id }, relations: ENROLLMENT_RELATIONS });
  }

  async getOrThrow(id: number): Promise<EnrollmentEntity> {
    const enrollment = await this.findById(id);
    if (!enrollment) {
      throw new DomainError(COURSE_ERROR.ENROLLMENT_NOT_FOUND, 'Enrollment not found.', { id });
    }
    return enrollment;
  }

  async search(params: SearchParams): Promise<SearchResult<EnrollmentEntity>> {
    return this.searchService.search({
      qb: this.enrollmentRepository
        .createQueryBuilder('enrollment')
        .leftJoinAndSelect('enrollment.student', 'student')
        .leftJoinAndSelect('student.user', 'user')
        .leftJoinAndSelect('enrollment.batch', 'batch')
        .leftJoinAndSelect('batch.course', 'course'),
      params,
      options: {
        searchColumns: ['student.regNo', 'user.firstName', 'user.lastName', 'batch.code'],
        allowedFilters: ['status', 'batchId', 'studentId'],
        resolveColumn: columnResolver({
          status: 'enrollment.status',
          batchId: 'enrollment.batchId',
          studentId: 'enrollment.studentId',
          enrolledOn: 'enrollment.enrolledOn',
          id: 'enrollment.id',
        }),
        allowedSorts: ['enrolledOn', 'id'],
        defaultSorts: [{ field: 'enrolledOn', direction: 'DESC' }],
      },
    });
  }

  /** 班级报名人数（包括所有状态） */
  async countByBatch(batchId: number, manager?: EntityManager): Promise<number> {
    return this.repo(manager).count({ where: { batchId } });
  }

  async findByStudentAndBatch(
    studentId: number,
    batchId: number,
    manager?: EntityManager,
  ): Promise<EnrollmentEntity | null> {
    return this.repo(manager).findOne({ where: { studentId, batchId } });
  }

  /** 学员的全部报名（含班级与课程） */
  async findByStudent(studentId: number): Promise<EnrollmentEntity[]> {
    return this.enrollmentRepository.find({
      where: { studentId },
      relations: ENROLLMENT_RELATIONS,
      order: { id: 'ASC' },
    });
  }

  /** 班级的全部报名（含学员用户） */
  async findByBatch(batchId: number): Promise<EnrollmentEntity[]> {
    return this.enrollmentRepository.find({
      where: { batchId },
      relations: ENROLLMENT_RELATIONS,
      order: { id: 'ASC' },
    });
  }

  /** 课程下全部报名（经由班级） */
  async findByCourse(courseId: number): Promise<EnrollmentEntity[]> {
    return this.enrollmentRepository.find({
      where: { batch: { courseId } },
      relations: ENROLLMENT_RELATIONS,
      order: { id: 'ASC' },
    });
  }

  async findAllWithRelations(): Promise<EnrollmentEntity[]> {
    return this.enrollmentRepository.find({ relations: ENROLLMENT_RELATIONS, order: { id: 'ASC' } });
  }

  /**
   * 学员在某课程下指定状态的最早一条报名
   */
  async findByStudentCourseStatus(
    studentId: number,
    courseId: number,
    status: EnrollmentStatus,
  ): Promise<EnrollmentEntity | null> {
    return this.enrollmentRepository.findOne({
      where: { studentId, status, batch: { courseId } },
      relations: ENROLLMENT_RELATIONS,
      order: { id: 'ASC' },
    });
  }

  /** 课程下不同学员数 */
  async countDistinctStudentsByCourse(courseId: number): Promise<number> {
    const row = await this.enrollmentRepository
      .createQueryBuilder('enrollment')
      .innerJoin('enrollment.batch', 'batch')
      .select('COUNT(DISTINCT enrollment.studentId)', 'total')
      .where('batch.courseId = :courseId', { courseId })
      .getRawOne<{ total: string | number }>();
    return Number(row?.total ?? 0);
  }

  /**
   * 班级中指定学员的进行中报名
   */
  async findActiveInBatch(
    batchId: number,
    studentIds: ReadonlyArray<number>,
    manager?: EntityManager,
  ): Promise<EnrollmentEntity[]> {
    if (studentIds.length === 0) return [];
    return this.repo(manager).find({
      where: { batchId, studentId: In([...studentIds]), status: EnrollmentStatus.ACTIVE },
    });
  }

  async create(
    data: { studentId: number; batchId: number; enrolledOn: string; status?: EnrollmentStatus },
    manager?: EntityManager,
  ): Promise<EnrollmentEntity> {
    const repo = this.repo(manager);
    const enrollment = repo.create({
      studentId: data.studentId,
      batchId: data.batchId,
      enrolledOn: data.enrolledOn,
      status: data.status ?? EnrollmentStatus.ACTIVE,
    });
    try {
      return await repo.save(enrollment);
    } catch (error) {
      if (isUniqueConstraintViolation(error)) {
        throw this.duplicateError(data.studentId, data.batchId, error);
      }
      throw error;
    }
  }

  async save(enrollment: EnrollmentEntity, manager?: EntityManager): Promise<EnrollmentEntity> {
    try {
      return await this.repo(manager).save(enrollment);
    } catch (error) {
      if (isUniqueConstraintViolation(error)) {
        throw this.duplicateError(enrollment.studentId, enrollment.batchId, error);
      }
      throw error;
    }
  }

  async update(
    id: number,
    patch: { readonly status?: EnrollmentStatus; readonly enrolledOn?: string },
  ): Promise<EnrollmentEntity> {
    const enrollment = await this.getOrThrow(id);
    await this.save(this.enrollmentRepository.merge(enrollment, patch));
    return this.getOrThrow(id);
  }

  async remove(id: number): Promise<void> {
    await this.enrollmentRepository.remove(await this.getOrThrow(id));
  }

  duplicateError(studentId: number, batchId: number, cause?: unknown): DomainError {
    return new DomainError(
      COURSE_ERROR.ENROLLMENT_DUPLICATE,
      'Student already enrolled in this batch.',
      { studentId, batchId },
      cause,
    );
  }
}
