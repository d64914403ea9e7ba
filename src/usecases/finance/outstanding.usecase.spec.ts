// src/usecases/finance/outstanding.usecase.spec.ts
import { type UsecaseSession } from '@app-types/auth/session.types';
import { FINANCE_ERROR } from '@core/common/errors/domain-error';
import { BatchService } from '@modules/course/batch.service';
import { CourseService } from '@modules/course/course.service';
import { EnrollmentService } from '@modules/course/enrollment.service';
import { FeesReceiptService } from '@modules/finance/fees-receipt.service';
import { StudentService } from '@modules/student/student.service';
import { Test } from '@nestjs/testing';
import { OUTSTANDING_FORBIDDEN_MESSAGE, OutstandingUsecase } from './outstanding.usecase';

describe('OutstandingUsecase', () => {
  const receiptService = { paidLedger: jest.fn(), paidByStudentInBatch: jest.fn(), totalCents: jest.fn() };
  const enrollmentService = { findByStudent: jest.fn(), findByBatch: jest.fn(), findByCourse: jest.fn() };
  const studentService = { findByUserId: jest.fn(), getOrThrow: jest.fn() };
  const batchService = { getOrThrow: jest.fn() };
  const courseService = { getOrThrow: jest.fn(), findAll: jest.fn() };
  const admin: UsecaseSession = { accountId: 1, username: 'admin', roles: ['ADMIN', 'STAFF'] };
  const studentSession: UsecaseSession = { accountId: 20, username: 'meena', roles: ['STUDENT'] };
  const course = { id: 3, title: 'Basic Tailoring', totalFees: '5000.00' };
  const student = { id: 7, regNo: 'STU2024-001', user: { firstName: 'Meena', lastName: 'Rao', username: 'meena' } };
  let usecase: OutstandingUsecase;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        OutstandingUsecase,
        { provide: FeesReceiptService, useValue: receiptService },
        { provide: EnrollmentService, useValue: enrollmentService },
        { provide: StudentService, useValue: studentService },
        { provide: BatchService, useValue: batchService },
        { provide: CourseService, useValue: courseService },
      ],
    }).compile();
    usecase = moduleRef.get(OutstandingUsecase);
  });

  it('学员查看他人欠费被拒绝', async () => {
    studentService.findByUserId.mockResolvedValue({ id: 8 });

    await expect(usecase.student(studentSession, 7)).rejects.toMatchObject({
      code: FINANCE_ERROR.OUTSTANDING_FORBIDDEN,
      message: OUTSTANDING_FORBIDDEN_MESSAGE,
    });
  });

  it('学员本人可查看，多缴部分不计为负欠费', async () => {
    studentService.findByUserId.mockResolvedValue({ id: 7 });
    studentService.getOrThrow.mockResolvedValue(student);
    enrollmentService.findByStudent.mockResolvedValue([
      { batch: { code: 'BT-01', course } },
      { batch: { code: 'EM-02', course: { id: 4, title: 'Embroidery', totalFees: '3000.00' } } },
    ]);
    receiptService.paidLedger.mockResolvedValue(
      new Map([
        ['7:3', 200000],
        ['7:4', 350000],
      ]),
    );

    await expect(usecase.student(studentSession, 7)).resolves.toEqual({
      student: 'Meena Rao',
      regNo: 'STU2024-001',
      courses: [
        { course: 'Basic Tailoring', batch: 'BT-01', totalFees: 5000, paid: 2000, due: 3000 },
        { course: 'Embroidery', batch: 'EM-02', totalFees: 3000, paid: 3500, due: 0 },
      ],
      totalPaid: 5500,
      totalDue: 3000,
    });
    expect(receiptService.paidLedger).toHaveBeenCalledWith({ studentIds: [7] });
  });

  it('没有报名时返回空列表与零合计', async () => {
    studentService.getOrThrow.mockResolvedValue(student);
    enrollmentService.findByStudent.mockResolvedValue([]);

    await expect(usecase.student(admin, 7)).resolves.toEqual({
      student: 'Meena Rao',
      regNo: 'STU2024-001',
      courses: [],
      totalPaid: 0,
      totalDue: 0,
    });
    expect(studentService.findByUserId).not.toHaveBeenCalled();
    expect(receiptService.paidLedger).not.toHaveBeenCalled();
  });

  it('班级汇总按班级收据计算', async () => {
    batchService.getOrThrow.mockResolvedValue({ id: 2, code: 'BT-01', course: { ...course, totalFees: '4000.00' } });
    enrollmentService.findByBatch.mockResolvedValue([
      { studentId: 7, student },
      { studentId: 9, student: { regNo: 'STU2024-002', user: { firstName: 'Ravi', lastName: '', username: 'ravi' } } },
    ]);
    receiptService.paidByStudentInBatch.mockResolvedValue(
      new Map([
        [7, 400000],
        [9, 100000],
      ]),
    );

    await expect(usecase.batch(2)).resolves.toEqual({
      batch: 'BT-01',
      course: 'Basic Tailoring',
      totalStudents: 2,
      totalFees: 8000,
      totalPaid: 5000,
      totalDue: 3000,
      students: [
        { student: 'Meena Rao', regNo: 'STU2024-001', paid: 4000, due: 0 },
        { student: 'Ravi', regNo: 'STU2024-002', paid: 1000, due: 3000 },
      ],
    });
  });

  it('全局汇总逐课程累加，单课程欠费不低于 0', async () => {
    courseService.findAll.mockResolvedValue([course, { id: 4, title: 'Embroidery', totalFees: '1000.00' }]);
    enrollmentService.findByCourse.mockImplementation((courseId: number) =>
      Promise.resolve(courseId === 3 ? [{}, {}] : [{}]),
    );
    receiptService.totalCents.mockImplementation((courseId: number) =>
      Promise.resolve(courseId === 3 ? 600000 : 150000),
    );

    await expect(usecase.overall()).resolves.toEqual({
      summary: [
        { course: 'Basic Tailoring', totalStudents: 2, expected: 10000, paid: 6000, due: 4000 },
        { course: 'Embroidery', totalStudents: 1, expected: 1000, paid: 1500, due: 0 },
      ],
      grandExpected: 11000,
      grandPaid: 7500,
      grandDue: 3500,
    });
  });
});
