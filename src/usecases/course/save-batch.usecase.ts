// src/usecases/course/save-batch.usecase.ts
import { COURSE_ERROR, DomainError } from '@core/common/errors/domain-error';
import { isDateRangeValid } from '@core/course/course.policy';
import { BatchEntity } from '@modules/course/batch.entity';
import { BatchData, BatchService } from '@modules/course/batch.service';
import { CourseService } from '@modules/course/course.service';
import { TrainerService } from '@modules/course/trainer.service';
import { Injectable } from '@nestjs/common';

export const BATCH_DATE_RANGE_MESSAGE = 'End date cannot be before start date.';

/**
 * 班级新建与修改
 * 修改时用合并后的起止日期校验区间
 */
@Injectable()
export class SaveBatchUsecase {
  constructor(
    private readonly batchService: BatchService,
    private readonly courseService: CourseService,
    private readonly trainerService: TrainerService,
  ) {}

  async create(data: BatchData): Promise<BatchEntity> {
    this.assertRange(data.startDate, data.endDate);
    await this.assertReferences(data);
    return this.batchService.create(data);
  }

  async update(id: number, patch: Partial<BatchData>): Promise<BatchEntity> {
    const current = await this.batchService.getOrThrow(id);
    this.assertRange(patch.startDate ?? current.startDate, patch.endDate ?? current.endDate);
    await this.assertReferences(patch);
    return this.batchService.update(id, patch);
  }

  private assertRange(startDate: string, endDate: string): void {
    if (!isDateRangeValid(startDate, endDate)) {
      throw new DomainError(COURSE_ERROR.INVALID_DATE_RANGE, BATCH_DATE_RANGE_MESSAGE, {
        startDate,
        endDate,
      });
    }
  }

  private async assertReferences(data: Partial<BatchData>): Promise<void> {
    if (data.courseId !== undefined) await this.courseService.getOrThrow(data.courseId);
    if (data.trainerId != null) await this.trainerService.getOrThrow(data.trainerId);
  }
}
