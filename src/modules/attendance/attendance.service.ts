// src/modules/attendance/attendance.service.ts
import { AttendanceStatus } from '@app-types/models/attendance.types';
import { ATTENDANCE_ERROR, DomainError } from '@core/common/errors/domain-error';
import { isUniqueConstraintViolation } from '@core/database/unique-violation';
import { columnResolver } from '@core/search/column-map';
import type { SearchParams, SearchResult } from '@core/search/search.types';
import { SearchService } from '@modules/common/search.module';
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { AttendanceEntryEntity } from './attendance-entry.entity';
import { AttendanceEntity } from './attendance.entity';

export interface AttendanceEntryData {
  readonly studentId: number;
  readonly status: AttendanceStatus;
}

export interface AttendanceData {
  readonly batchId: number;
  readonly date: string;
  readonly remarks?: string | null;
}

const ATTENDANCE_RELATIONS = {
  batch: { course: true },
  takenBy: true,
  entries: { student: { user: true } },
} as const;

/**
 * 考勤服务：考勤记录与明细的读写及统计查询
 */
@Injectable()
export class AttendanceService {
  constructor(
    @InjectRepository(AttendanceEntity)
    private readonly attendanceRepository: Repository<AttendanceEntity>,
    @InjectRepository(AttendanceEntryEntity)
    private readonly entryRepository: Repository<AttendanceEntryEntity>,
    private readonly searchService: SearchService,
  ) {}

  private repo(manager?: EntityManager): Repository<AttendanceEntity> {
    return manager ? manager.getRepository(AttendanceEntity) : this.attendanceRepository;
  }

  private entries(manager?: EntityManager): Repository<AttendanceEntryEntity> {
    return manager ? manager.getRepository(AttendanceEntryEntity) : this.entryRepository;
  }

  async findById(id: number, manager?: EntityManager): Promise<AttendanceEntity | null> {
    return this.repo(manager).findOne({
      where: { id },
      relations: ATTENDANCE_RELATIONS,
      order: { entries: { id: 'ASC' } },
    });
  }

  async getOrThrow(id: number, manager?: EntityManager): Promise<AttendanceEntity> {
    const attendance = await this.findById(id, manager);
    if (!attendance) {
      throw new DomainError(ATTENDANCE_ERROR.ATTENDANCE_NOT_FOUND, 'Attendance record not found.', {
        id,
      });
    }
    return attendance;
  }

  async search(params: SearchParams): Promise<SearchResult<AttendanceEntity>> {
    return this.searchService.search({
      qb: this.attendanceRepository
        .createQueryBuilder('attendance')
        .leftJoinAndSelect('attendance.batch', 'batch')
        .leftJoinAndSelect('batch.course', 'course')
        .leftJoinAndSelect('attendance.takenBy', 'takenBy')
        .leftJoinAndSelect('attendance.entries', 'entry')
        .leftJoinAndSelect('entry.student', 'student')
        .leftJoinAndSelect('student.user', 'studentUser'),
      params,
      options: {
        searchColumns: ['batch.code', 'attendance.remarks', 'takenBy.username'],
        allowedFilters: ['batchId', 'date', 'courseId'],
        resolveColumn: columnResolver({
          batchId: 'attendance.batchId',
          date: 'attendance.date',
          courseId: 'batch.courseId',
          id: 'attendance.id',
        }),
        allowedSorts: ['date', 'id'],
        defaultSorts: [{ field: 'date', direction: 'DESC' }],
      },
    });
  }

  /**
   * 新建考勤记录（不含明细）
   * 同一班级同一日期重复时抛出 409
   */
  async createRecord(
    data: AttendanceData & { readonly takenById: number | null },
    manager?: EntityManager,
  ): Promise<AttendanceEntity> {
    const repo = this.repo(manager);
    return this.persist(
      repo,
      repo.create({
        batchId: data.batchId,
        date: data.date,
        remarks: data.remarks ?? null,
        takenById: data.takenById,
      }),
    );
  }

  async updateRecord(
    attendance: AttendanceEntity,
    patch: Partial<AttendanceData>,
    manager?: EntityManager,
  ): Promise<AttendanceEntity> {
    const repo = this.repo(manager);
    const next = repo.merge(attendance, patch);
    if (patch.batchId !== undefined) next.batch = undefined;
    // 明细单独维护，避免 save 时按关系比对
    next.entries = undefined;
    return this.persist(repo, next);
  }

  /** 用新明细整体替换 */
  async replaceEntries(
    attendanceId: number,
    entries: ReadonlyArray<AttendanceEntryData>,
    manager?: EntityManager,
  ): Promise<void> {
    const repo = this.entries(manager);
    await repo.delete({ attendanceId });
    if (entries.length === 0) return;
    await repo.insert(
      entries.map((entry) => ({ attendanceId, studentId: entry.studentId, status: entry.status })),
    );
  }

  async remove(id: number): Promise<void> {
    await this.attendanceRepository.remove(await this.getOrThrow(id));
  }

  /**
   * 指定学员在某班级的出勤天数（状态 P）
   * 未出现在结果中的学员为 0
   */
  async countPresentDays(
    batchId: number,
    studentIds: ReadonlyArray<number>,
    manager?: EntityManager,
  ): Promise<Map<number, number>> {
    const result = new Map<number, number>(studentIds.map((id) => [id, 0]));
    if (studentIds.length === 0) return result;
    const rows = await this.entries(manager)
      .createQueryBuilder('entry')
      .innerJoin('entry.attendance', 'attendance')
      .select('entry.studentId', 'studentId')
      .addSelect('COUNT(entry.id)', 'total')
      .where('attendance.batchId = :batchId', { batchId })
      .andWhere('entry.status = :status', { status: AttendanceStatus.PRESENT })
      .andWhere('entry.studentId IN (:...studentIds)', { studentIds: [...studentIds] })
      .groupBy('entry.studentId')
      .getRawMany<{ studentId: number | string; total: number | string }>();
    for (const row of rows) result.set(Number(row.studentId), Number(row.total));
    return result;
  }

  async presentDaysFor(studentId: number, batchId: number): Promise<number> {
    const counts = await this.countPresentDays(batchId, [studentId]);
    return counts.get(studentId) ?? 0;
  }

  /** 班级全部考勤记录（含明细），按日期升序 */
  async findByBatchWithEntries(batchId: number): Promise<AttendanceEntity[]> {
    return this.attendanceRepository.find({
      where: { batchId },
      relations: { entries: true },
      order: { date: 'ASC', id: 'ASC' },
    });
  }

  /**
   * 学员的全部考勤明细（含班级与课程），按日期倒序
   */
  async findEntriesByStudent(studentId: number): Promise<AttendanceEntryEntity[]> {
    return this.entryRepository.find({
      where: { studentId },
      relations: { attendance: { batch: { course: true } } },
      order: { attendance: { date: 'DESC' }, id: 'DESC' },
    });
  }

  private async persist(
    repo: Repository<AttendanceEntity>,
    attendance: AttendanceEntity,
  ): Promise<AttendanceEntity> {
    try {
      return await repo.save(attendance);
    } catch (error) {
      if (isUniqueConstraintViolation(error)) {
        throw new DomainError(
          ATTENDANCE_ERROR.ATTENDANCE_DUPLICATE,
          'Attendance for this batch and date already exists.',
          { batchId: attendance.batchId, date: attendance.date },
          error,
        );
      }
      throw error;
    }
  }
}
