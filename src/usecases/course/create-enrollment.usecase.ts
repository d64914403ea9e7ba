// src/usecases/course/create-enrollment.usecase.ts
import { type UsecaseSession } from '@app-types/auth/session.types';
import { EnrollmentStatus } from '@app-types/models/course.types';
import { todayString } from '@core/common/date/date.helper';
import { COURSE_ERROR, DomainError } from '@core/common/errors/domain-error';
import { isBatchFull } from '@core/course/course.policy';
import { BatchService } from '@modules/course/batch.service';
import { EnrollmentEntity } from '@modules/course/enrollment.entity';
import { EnrollmentService } from '@modules/course/enrollment.service';
import { StudentService } from '@modules/student/student.service';
import { Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';
import { DataSource } from 'typeorm';

export const BATCH_CAPACITY_MESSAGE = 'Batch capacity reached.';

export interface CreateEnrollmentInput {
  readonly studentId: number;
  readonly batchId: number;
  readonly enrolledOn?: string;
  readonly status?: EnrollmentStatus;
}

/**
 * 报名
 * 锁定班级行后检查重复与名额，并发报名不会超出容量
 */
@Injectable()
export class CreateEnrollmentUsecase {
  constructor(
    private readonly dataSource: DataSource,
    private readonly batchService: BatchService,
    private readonly enrollmentService: EnrollmentService,
    private readonly studentService: StudentService,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(CreateEnrollmentUsecase.name);
  }

  async execute(session: UsecaseSession, input: CreateEnrollmentInput): Promise<EnrollmentEntity> {
    const created = await this.dataSource.transaction(async (manager) => {
      const batch = await this.batchService.lockForUpdate(input.batchId, manager);
      await this.studentService.getOrThrow(input.studentId, manager);

      const existing = await this.enrollmentService.findByStudentAndBatch(
        input.studentId,
        batch.id,
        manager,
      );
      if (existing) throw this.enrollmentService.duplicateError(input.studentId, batch.id);

      const enrolled = await this.enrollmentService.countByBatch(batch.id, manager);
      if (isBatchFull(enrolled, batch.capacity)) {
        throw new DomainError(COURSE_ERROR.BATCH_CAPACITY_REACHED, BATCH_CAPACITY_MESSAGE, {
          batchId: batch.id,
          capacity: batch.capacity,
        });
      }

      return this.enrollmentService.create(
        {
          studentId: input.studentId,
          batchId: batch.id,
          enrolledOn: input.enrolledOn ?? todayString(),
          status: input.status,
        },
        manager,
      );
    });

    this.logger.info(
      { enrollmentId: created.id, batchId: created.batchId, by: session.accountId },
      '报名成功',
    );
    return this.enrollmentService.getOrThrow(created.id);
  }
}
