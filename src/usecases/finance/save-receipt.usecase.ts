// src/usecases/finance/save-receipt.usecase.ts
import { type UsecaseSession } from '@app-types/auth/session.types';
import { PaymentMode } from '@app-types/models/finance.types';
import { todayString } from '@core/common/date/date.helper';
import { DomainError, FINANCE_ERROR } from '@core/common/errors/domain-error';
import { buildEnvelope } from '@core/common/integration-events/events.types';
import type { IOutboxWriterPort } from '@core/common/integration-events/outbox.port';
import { toCents } from '@core/common/numeric/money';
import { buildReceiptNo } from '@core/finance/finance.policy';
import { OUTBOX_WRITER } from '@modules/common/integration-events/events.tokens';
import { BatchService } from '@modules/course/batch.service';
import { CourseService } from '@modules/course/course.service';
import { EnrollmentService } from '@modules/course/enrollment.service';
import { FeesReceiptEntity } from '@modules/finance/fees-receipt.entity';
import { FeesReceiptPatch, FeesReceiptService } from '@modules/finance/fees-receipt.service';
import { StudentService } from '@modules/student/student.service';
import { Inject, Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';
import { DataSource, EntityManager } from 'typeorm';

export const RECEIPT_LOCKED_MESSAGE = 'This receipt is locked and cannot be edited.';

export interface CreateReceiptInput {
  readonly receiptNo?: string;
  readonly studentId: number;
  readonly courseId?: number | null;
  readonly batchId?: number | null;
  readonly amount: string;
  readonly mode: PaymentMode;
  readonly txnId?: string;
  readonly date?: string;
}

export type UpdateReceiptInput = Partial<CreateReceiptInput>;

interface ReceiptRefs {
  readonly studentId: number;
  readonly courseId: number | null;
  readonly batchId: number | null;
  readonly amount: string;
}

/**
 * 收据录入、修改、删除与锁定
 * 保存后发布 FeesReceiptSaved，由处理器检查是否仍有欠费
 */
@Injectable()
export class SaveReceiptUsecase {
  constructor(
    private readonly dataSource: DataSource,
    private readonly receiptService: FeesReceiptService,
    private readonly studentService: StudentService,
    private readonly courseService: CourseService,
    private readonly batchService: BatchService,
    private readonly enrollmentService: EnrollmentService,
    @Inject(OUTBOX_WRITER)
    private readonly outboxWriter: IOutboxWriterPort,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(SaveReceiptUsecase.name);
  }

  async create(session: UsecaseSession, input: CreateReceiptInput): Promise<FeesReceiptEntity> {
    await this.validate({
      studentId: input.studentId,
      courseId: input.courseId ?? null,
      batchId: input.batchId ?? null,
      amount: input.amount,
    });

    const saved = await this.dataSource.transaction(async (manager) => {
      const receiptNo =
        input.receiptNo?.trim() || buildReceiptNo(await this.receiptService.lastId(manager));
      const receipt = await this.receiptService.create(
        {
          receiptNo,
          studentId: input.studentId,
          courseId: input.courseId ?? null,
          batchId: input.batchId ?? null,
          amount: input.amount,
          mode: input.mode,
          txnId: input.txnId,
          date: input.date ?? todayString(),
          postedById: session.accountId,
        },
        manager,
      );
      await this.publish(receipt, manager);
      return receipt;
    });

    this.logger.info({ receiptId: saved.id, receiptNo: saved.receiptNo }, '收据已录入');
    return this.receiptService.getOrThrow(saved.id);
  }

  async update(id: number, input: UpdateReceiptInput): Promise<FeesReceiptEntity> {
    const current = await this.receiptService.getOrThrow(id);
    this.assertUnlocked(current);
    await this.validate({
      studentId: input.studentId ?? current.studentId,
      courseId: input.courseId !== undefined ? input.courseId : current.courseId,
      batchId: input.batchId !== undefined ? input.batchId : current.batchId,
      amount: input.amount ?? current.amount,
    });

    const patch: FeesReceiptPatch = {
      receiptNo: input.receiptNo?.trim() || undefined,
      studentId: input.studentId,
      courseId: input.courseId,
      batchId: input.batchId,
      amount: input.amount,
      mode: input.mode,
      txnId: input.txnId,
      date: input.date,
    };
    await this.dataSource.transaction(async (manager) => {
      const saved = await this.receiptService.update(current, patch, manager);
      await this.publish(saved, manager);
    });
    return this.receiptService.getOrThrow(id);
  }

  async remove(id: number): Promise<void> {
    const receipt = await this.receiptService.getOrThrow(id);
    this.assertUnlocked(receipt);
    await this.receiptService.remove(receipt);
    this.logger.info({ receiptId: id, receiptNo: receipt.receiptNo }, '收据已删除');
  }

  async lock(id: number): Promise<{ detail: string }> {
    const receipt = await this.receiptService.getOrThrow(id);
    if (receipt.locked) return { detail: 'Already locked.' };
    await this.receiptService.update(receipt, { locked: true });
    return { detail: 'Receipt locked.' };
  }

  async unlock(id: number): Promise<{ detail: string }> {
    const receipt = await this.receiptService.getOrThrow(id);
    if (!receipt.locked) return { detail: 'Already unlocked.' };
    await this.receiptService.update(receipt, { locked: false });
    return { detail: 'Receipt unlocked.' };
  }

  private assertUnlocked(receipt: FeesReceiptEntity): void {
    if (receipt.locked) {
      throw new DomainError(FINANCE_ERROR.RECEIPT_LOCKED, RECEIPT_LOCKED_MESSAGE, {
        receiptId: receipt.id,
      });
    }
  }

  /**
   * 引用存在性与一致性：班级属于所选课程，学员报过该班级
   */
  private async validate(refs: ReceiptRefs): Promise<void> {
    if (toCents(refs.amount) < 0) {
      throw new DomainError(FINANCE_ERROR.NEGATIVE_AMOUNT, 'Amount must be non-negative.');
    }
    await this.studentService.getOrThrow(refs.studentId);
    if (refs.courseId !== null) await this.courseService.getOrThrow(refs.courseId);
    if (refs.batchId === null) return;

    const batch = await this.batchService.getOrThrow(refs.batchId);
    if (refs.courseId !== null && batch.courseId !== refs.courseId) {
      throw new DomainError(
        FINANCE_ERROR.BATCH_COURSE_MISMATCH,
        'Selected batch does not belong to the selected course.',
        { batchId: batch.id, courseId: refs.courseId },
      );
    }
    const enrollment = await this.enrollmentService.findByStudentAndBatch(refs.studentId, batch.id);
    if (!enrollment) {
      throw new DomainError(
        FINANCE_ERROR.STUDENT_NOT_ENROLLED,
        'Student is not enrolled in the selected batch.',
        { studentId: refs.studentId, batchId: batch.id },
      );
    }
  }

  private async publish(receipt: FeesReceiptEntity, manager: EntityManager): Promise<void> {
    await this.outboxWriter.enqueue({
      envelope: buildEnvelope({
        type: 'FeesReceiptSaved',
        aggregateType: 'FeesReceipt',
        aggregateId: receipt.id,
        payload: { receiptId: receipt.id },
      }),
      tx: { kind: 'tx', opaque: manager },
    });
  }
}
