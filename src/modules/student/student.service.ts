// src/modules/student/student.service.ts
import { DomainError, STUDENT_ERROR } from '@core/common/errors/domain-error';
import { isUniqueConstraintViolation } from '@core/database/unique-violation';
import { columnResolver } from '@core/search/column-map';
import type { SearchParams, SearchResult } from '@core/search/search.types';
import { SearchService } from '@modules/common/search.module';
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, In, Repository } from 'typeorm';
import { StudentEntity } from './student.entity';

export interface StudentData {
  readonly userId: number;
  readonly regNo: string;
  readonly guardianName?: string;
  readonly guardianPhone?: string;
  readonly admissionDate: string;
  readonly address?: string | null;
  readonly active?: boolean;
}

export type StudentPatch = Partial<Omit<StudentData, 'userId' | 'regNo'>> & {
  readonly photo?: string | null;
};

/**
 * 学员档案服务
 * 写操作携带操作人，供变更历史订阅器记录
 */
@Injectable()
export class StudentService {
  constructor(
    @InjectRepository(StudentEntity)
    private readonly studentRepository: Repository<StudentEntity>,
    private readonly searchService: SearchService,
  ) {}

  private repo(manager?: EntityManager): Repository<StudentEntity> {
    return manager ? manager.getRepository(StudentEntity) : this.studentRepository;
  }

  async findById(id: number, manager?: EntityManager): Promise<StudentEntity | null> {
    return this.repo(manager).findOne({ where: { id }, relations: ['user'] });
  }

  async getOrThrow(id: number, manager?: EntityManager): Promise<StudentEntity> {
    const student = await this.findById(id, manager);
    if (!student) {
      throw new DomainError(STUDENT_ERROR.STUDENT_NOT_FOUND, 'Student not found.', { id });
    }
    return student;
  }

  async findByUserId(userId: number): Promise<StudentEntity | null> {
    return this.studentRepository.findOne({ where: { userId }, relations: ['user'] });
  }

  /** 当前用户的学员档案，不存在时抛出 */
  async getByUserIdOrThrow(
    userId: number,
    message = 'Student profile not found for this user.',
  ): Promise<StudentEntity> {
    const student = await this.findByUserId(userId);
    if (!student) throw new DomainError(STUDENT_ERROR.PROFILE_NOT_FOUND, message, { userId });
    return student;
  }

  async findManyByIds(ids: ReadonlyArray<number>): Promise<StudentEntity[]> {
    if (ids.length === 0) return [];
    return this.studentRepository.find({ where: { id: In([...ids]) }, relations: ['user'] });
  }

  /** 以 prefix 开头的最大学号；先比长度再比字典序 */
  async findLastRegNo(prefix: string, manager?: EntityManager): Promise<string | null> {
    const row = await this.repo(manager)
      .createQueryBuilder('student')
      .select('student.regNo', 'regNo')
      .where('student.regNo LIKE :prefix', { prefix: `${prefix}%` })
      .orderBy('LENGTH(student.regNo)', 'DESC')
      .addOrderBy('student.regNo', 'DESC')
      .limit(1)
      .getRawOne<{ regNo: string }>();
    return row?.regNo ?? null;
  }

  async search(params: SearchParams): Promise<SearchResult<StudentEntity>> {
    return this.searchService.search({
      qb: this.studentRepository
        .createQueryBuilder('student')
        .leftJoinAndSelect('student.user', 'user'),
      params,
      options: {
        searchColumns: [
          'student.regNo',
          'user.firstName',
          'user.lastName',
          'student.guardianName',
          'student.guardianPhone',
        ],
        allowedFilters: ['active', 'admissionDate'],
        resolveColumn: columnResolver({
          id: 'student.id',
          regNo: 'student.regNo',
          active: 'student.active',
          admissionDate: 'student.admissionDate',
        }),
        allowedSorts: ['admissionDate', 'regNo', 'id'],
        defaultSorts: [
          { field: 'admissionDate', direction: 'DESC' },
          { field: 'regNo', direction: 'ASC' },
        ],
      },
    });
  }

  /**
   * 启用中的学员（用户也为启用状态）
   */
  async findActiveWithActiveUser(): Promise<StudentEntity[]> {
    return this.studentRepository
      .createQueryBuilder('student')
      .innerJoinAndSelect('student.user', 'user')
      .where('student.active = :active', { active: true })
      .andWhere('user.isActive = :userActive', { userActive: true })
      .getMany();
  }

  async create(
    data: StudentData,
    actor: string | null,
    manager?: EntityManager,
  ): Promise<StudentEntity> {
    const repo = this.repo(manager);
    const student = repo.create({
      userId: data.userId,
      regNo: data.regNo,
      guardianName: data.guardianName ?? '',
      guardianPhone: data.guardianPhone ?? '',
      admissionDate: data.admissionDate,
      address: data.address ?? null,
      photo: null,
      active: data.active ?? true,
    });
    try {
      return await repo.save(student, { data: { actor } });
    } catch (error) {
      if (isUniqueConstraintViolation(error)) {
        throw new DomainError(
          STUDENT_ERROR.REG_NO_ALREADY_EXISTS,
          'Registration number already exists. Please retry.',
          { regNo: data.regNo },
          error,
        );
      }
      throw error;
    }
  }

  async update(id: number, patch: StudentPatch, actor: string | null): Promise<StudentEntity> {
    const student = await this.getOrThrow(id);
    const next = this.studentRepository.merge(student, patch);
    return this.studentRepository.save(next, { data: { actor } });
  }

  async remove(id: number, actor: string | null): Promise<void> {
    const student = await this.getOrThrow(id);
    await this.studentRepository.remove(student, { data: { actor } });
  }
}
