// src/modules/course/course.service.ts
import { COURSE_ERROR, DomainError } from '@core/common/errors/domain-error';
import { isUniqueConstraintViolation } from '@core/database/unique-violation';
import { columnResolver } from '@core/search/column-map';
import type { SearchParams, SearchResult } from '@core/search/search.types';
import { SearchService } from '@modules/common/search.module';
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { CourseEntity } from './course.entity';

export interface CourseData {
  readonly code: string;
  readonly title: string;
  readonly durationWeeks: number;
  readonly totalFees: string;
  readonly syllabus?: string | null;
  readonly active?: boolean;
  readonly requiredAttendanceDays?: number;
}

/**
 * 课程服务
 */
@Injectable()
export class CourseService {
  constructor(
    @InjectRepository(CourseEntity)
    private readonly courseRepository: Repository<CourseEntity>,
    private readonly searchService: SearchService,
  ) {}

  async findById(id: number): Promise<CourseEntity | null> {
    return this.courseRepository.findOne({ where: { id } });
  }

  async getOrThrow(id: number): Promise<CourseEntity> {
    const course = await this.findById(id);
    if (!course) throw new DomainError(COURSE_ERROR.COURSE_NOT_FOUND, 'Course not found.', { id });
    return course;
  }

  async findAll(): Promise<CourseEntity[]> {
    return this.courseRepository.find({ order: { title: 'ASC' } });
  }

  async search(params: SearchParams): Promise<SearchResult<CourseEntity>> {
    return this.searchService.search({
      qb: this.courseRepository.createQueryBuilder('course'),
      params,
      options: {
        searchColumns: ['course.code', 'course.title'],
        allowedFilters: ['active', 'durationWeeks'],
        resolveColumn: columnResolver({
          active: 'course.active',
          durationWeeks: 'course.durationWeeks',
          title: 'course.title',
          totalFees: 'course.totalFees',
        }),
        allowedSorts: ['title', 'durationWeeks', 'totalFees'],
        defaultSorts: [{ field: 'title', direction: 'ASC' }],
      },
    });
  }

  async create(data: CourseData): Promise<CourseEntity> {
    const course = this.courseRepository.create({
      code: data.code.trim(),
      title: data.title.trim(),
      durationWeeks: data.durationWeeks,
      totalFees: data.totalFees,
      syllabus: data.syllabus ?? null,
      active: data.active ?? true,
      requiredAttendanceDays: data.requiredAttendanceDays ?? 0,
    });
    return this.persist(course);
  }

  async update(id: number, patch: Partial<CourseData>): Promise<CourseEntity> {
    const course = await this.getOrThrow(id);
    return this.persist(this.courseRepository.merge(course, patch));
  }

  async remove(id: number): Promise<void> {
    await this.courseRepository.remove(await this.getOrThrow(id));
  }

  private async persist(course: CourseEntity): Promise<CourseEntity> {
    try {
      return await this.courseRepository.save(course);
    } catch (error) {
      if (isUniqueConstraintViolation(error)) {
        throw new DomainError(
          COURSE_ERROR.COURSE_CODE_ALREADY_EXISTS,
          'Course with this code already exists.',
          { code: course.code },
          error,
        );
      }
      throw error;
    }
  }
}
