// src/usecases/finance/save-receipt.usecase.spec.ts
import { type UsecaseSession } from '@app-types/auth/session.types';
import { PaymentMode } from '@app-types/models/finance.types';
import { FINANCE_ERROR } from '@core/common/errors/domain-error';
import { OUTBOX_WRITER } from '@modules/common/integration-events/events.tokens';
import { BatchService } from '@modules/course/batch.service';
import { CourseService } from '@modules/course/course.service';
import { EnrollmentService } from '@modules/course/enrollment.service';
import { FeesReceiptService } from '@modules/finance/fees-receipt.service';
import { StudentService } from '@modules/student/student.service';
import { Test } from '@nestjs/testing';
import { PinoLogger } from 'nestjs-pino';
import { DataSource } from 'typeorm';
import { RECEIPT_LOCKED_MESSAGE, SaveReceiptUsecase } from './save-receipt.usecase';

describe('SaveReceiptUsecase', () => {
  const manager = { tag: 'tx' };
  const dataSource = { transaction: jest.fn() };
  const receiptService = {
    lastId: jest.fn(),
    create: jest.fn(),
    update: jest.fn(),
    remove: jest.fn(),
    getOrThrow: jest.fn(),
  };
  const studentService = { getOrThrow: jest.fn() };
  const courseService = { getOrThrow: jest.fn() };
  const batchService = { getOrThrow: jest.fn() };
  const enrollmentService = { findByStudentAndBatch: jest.fn() };
  const outboxWriter = { enqueue: jest.fn() };
  const logger = { setContext: jest.fn(), info: jest.fn() };
  const session: UsecaseSession = { accountId: 2, username: 'office', roles: ['STAFF'] };
  let usecase: SaveReceiptUsecase;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        SaveReceiptUsecase,
        { provide: DataSource, useValue: dataSource },
        { provide: FeesReceiptService, useValue: receiptService },
        { provide: StudentService, useValue: studentService },
        { provide: CourseService, useValue: courseService },
        { provide: BatchService, useValue: batchService },
        { provide: EnrollmentService, useValue: enrollmentService },
        { provide: OUTBOX_WRITER, useValue: outboxWriter },
        { provide: PinoLogger, useValue: logger },
      ],
    }).compile();
    usecase = moduleRef.get(SaveReceiptUsecase);
    dataSource.transaction.mockImplementation((work: (m: typeof manager) => Promise<unknown>) =>
      work(manager),
    );
  });

  it('班级不属于所选课程时拒绝', async () => {
    batchService.getOrThrow.mockResolvedValue({ id: 2, courseId: 4 });

    await expect(
      usecase.create(session, {
        studentId: 7,
        courseId: 3,
        batchId: 2,
        amount: '1500.00',
        mode: PaymentMode.CASH,
      }),
    ).rejects.toMatchObject({ code: FINANCE_ERROR.BATCH_COURSE_MISMATCH });
    expect(dataSource.transaction).not.toHaveBeenCalled();
  });

  it('学员未报该班级时拒绝', async () => {
    batchService.getOrThrow.mockResolvedValue({ id: 2, courseId: 3 });
    enrollmentService.findByStudentAndBatch.mockResolvedValue(null);

    await expect(
      usecase.create(session, {
        studentId: 7,
        courseId: 3,
        batchId: 2,
        amount: '1500.00',
        mode: PaymentMode.CASH,
      }),
    ).rejects.toMatchObject({
      code: FINANCE_ERROR.STUDENT_NOT_ENROLLED,
      message: 'Student is not enrolled in the selected batch.',
    });
  });

  it('未填收据号时按最大 id 生成，并在事务内发布事件', async () => {
    receiptService.lastId.mockResolvedValue(41);
    receiptService.create.mockResolvedValue({ id: 42, receiptNo: 'RCP-000042' });
    receiptService.getOrThrow.mockResolvedValue({ id: 42, receiptNo: 'RCP-000042' });

    await usecase.create(session, {
      studentId: 7,
      courseId: 3,
      amount: '1500.00',
      mode: PaymentMode.UPI,
      txnId: 'UPI-1',
      date: '2024-05-01',
    });

    expect(receiptService.create).toHaveBeenCalledWith(
      {
        receiptNo: 'RCP-000042',
        studentId: 7,
        courseId: 3,
        batchId: null,
        amount: '1500.00',
        mode: PaymentMode.UPI,
        txnId: 'UPI-1',
        date: '2024-05-01',
        postedById: 2,
      },
      manager,
    );
    expect(outboxWriter.enqueue).toHaveBeenCalledWith(
      expect.objectContaining({ tx: { kind: 'tx', opaque: manager } }),
    );
    expect(outboxWriter.enqueue.mock.calls[0][0].envelope).toMatchObject({
      type: 'FeesReceiptSaved',
      aggregateId: 42,
      payload: { receiptId: 42 },
    });
  });

  it('负数金额被拒绝', async () => {
    await expect(
      usecase.create(session, { studentId: 7, amount: '-1.00', mode: PaymentMode.CASH }),
    ).rejects.toMatchObject({ code: FINANCE_ERROR.NEGATIVE_AMOUNT });
    expect(studentService.getOrThrow).not.toHaveBeenCalled();
  });

  it('锁定的收据不可删除', async () => {
    receiptService.getOrThrow.mockResolvedValue({ id: 42, locked: true });

    await expect(usecase.remove(42)).rejects.toMatchObject({
      code: FINANCE_ERROR.RECEIPT_LOCKED,
      message: RECEIPT_LOCKED_MESSAGE,
    });
    expect(receiptService.remove).not.toHaveBeenCalled();
  });

  it('重复锁定返回 Already locked.', async () => {
    receiptService.getOrThrow.mockResolvedValue({ id: 42, locked: true });

    await expect(usecase.lock(42)).resolves.toEqual({ detail: 'Already locked.' });
    expect(receiptService.update).not.toHaveBeenCalled();
  });
});
