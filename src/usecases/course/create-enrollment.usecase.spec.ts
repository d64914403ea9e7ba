// src/usecases/course/create-enrollment.usecase.spec.ts
import { type UsecaseSession } from '@app-types/auth/session.types';
import { COURSE_ERROR, DomainError } from '@core/common/errors/domain-error';
import { BatchService } from '@modules/course/batch.service';
import { EnrollmentService } from '@modules/course/enrollment.service';
import { StudentService } from '@modules/student/student.service';
import { Test } from '@nestjs/testing';
import { PinoLogger } from 'nestjs-pino';
import { DataSource } from 'typeorm';
import { BATCH_CAPACITY_MESSAGE, CreateEnrollmentUsecase } from './create-enrollment.usecase';

describe('CreateEnrollmentUsecase', () => {
  const manager = { tag: 'tx' };
  const dataSource = { transaction: jest.fn() };
  const batchService = { lockForUpdate: jest.fn() };
  const studentService = { getOrThrow: jest.fn() };
  const enrollmentService = {
    findByStudentAndBatch: jest.fn(),
    countByBatch: jest.fn(),
    create: jest.fn(),
    getOrThrow: jest.fn(),
    duplicateError: jest.fn(),
  };
  const logger = { setContext: jest.fn(), info: jest.fn() };
  const session: UsecaseSession = { accountId: 2, username: 'desk', roles: ['STAFF'] };
  let usecase: CreateEnrollmentUsecase;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        CreateEnrollmentUsecase,
        { provide: DataSource, useValue: dataSource },
        { provide: BatchService, useValue: batchService },
        { provide: EnrollmentService, useValue: enrollmentService },
        { provide: StudentService, useValue: studentService },
        { provide: PinoLogger, useValue: logger },
      ],
    }).compile();
    usecase = moduleRef.get(CreateEnrollmentUsecase);
    dataSource.transaction.mockImplementation((work: (m: typeof manager) => Promise<unknown>) =>
      work(manager),
    );
    batchService.lockForUpdate.mockResolvedValue({ id: 3, capacity: 2 });
    studentService.getOrThrow.mockResolvedValue({ id: 9 });
  });

  it('班级已满时拒绝', async () => {
    enrollmentService.findByStudentAndBatch.mockResolvedValue(null);
    enrollmentService.countByBatch.mockResolvedValue(2);

    await expect(usecase.execute(session, { studentId: 9, batchId: 3 })).rejects.toMatchObject({
      code: COURSE_ERROR.BATCH_CAPACITY_REACHED,
      message: BATCH_CAPACITY_MESSAGE,
    });
    expect(enrollmentService.create).not.toHaveBeenCalled();
  });

  it('重复报名返回冲突错误', async () => {
    const duplicate = new DomainError(
      COURSE_ERROR.ENROLLMENT_DUPLICATE,
      'Student already enrolled in this batch.',
    );
    enrollmentService.findByStudentAndBatch.mockResolvedValue({ id: 1 });
    enrollmentService.duplicateError.mockReturnValue(duplicate);

    await expect(usecase.execute(session, { studentId: 9, batchId: 3 })).rejects.toBe(duplicate);
    expect(enrollmentService.countByBatch).not.toHaveBeenCalled();
  });

  it('有名额时在事务内创建报名', async () => {
    enrollmentService.findByStudentAndBatch.mockResolvedValue(null);
    enrollmentService.countByBatch.mockResolvedValue(1);
    enrollmentService.create.mockResolvedValue({ id: 15, batchId: 3 });
    enrollmentService.getOrThrow.mockResolvedValue({ id: 15, batchId: 3, studentId: 9 });

    const result = await usecase.execute(session, {
      studentId: 9,
      batchId: 3,
      enrolledOn: '2024-07-01',
    });

    expect(batchService.lockForUpdate).toHaveBeenCalledWith(3, manager);
    expect(enrollmentService.create).toHaveBeenCalledWith(
      { studentId: 9, batchId: 3, enrolledOn: '2024-07-01', status: undefined },
      manager,
    );
    expect(result).toEqual({ id: 15, batchId: 3, studentId: 9 });
  });
});
