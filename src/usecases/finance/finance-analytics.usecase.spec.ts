// src/usecases/finance/finance-analytics.usecase.spec.ts
import { CourseService } from '@modules/course/course.service';
import { EnrollmentService } from '@modules/course/enrollment.service';
import { TrainerService } from '@modules/course/trainer.service';
import { ExpenseService } from '@modules/finance/expense.service';
import { FeesReceiptService } from '@modules/finance/fees-receipt.service';
import { PayrollService } from '@modules/finance/payroll.service';
import { Test } from '@nestjs/testing';
import { FinanceAnalyticsUsecase } from './finance-analytics.usecase';

describe('FinanceAnalyticsUsecase', () => {
  const receiptService = { totalCents: jest.fn(), monthlyCents: jest.fn() };
  const expenseService = { totalCents: jest.fn(), monthlyCents: jest.fn() };
  const payrollService = { totalCents: jest.fn(), monthlyCents: jest.fn(), findByTrainer: jest.fn() };
  const courseService = { getOrThrow: jest.fn() };
  const trainerService = { getOrThrow: jest.fn() };
  const enrollmentService = { countDistinctStudentsByCourse: jest.fn() };
  let usecase: FinanceAnalyticsUsecase;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        FinanceAnalyticsUsecase,
        { provide: FeesReceiptService, useValue: receiptService },
        { provide: ExpenseService, useValue: expenseService },
        { provide: PayrollService, useValue: payrollService },
        { provide: CourseService, useValue: courseService },
        { provide: TrainerService, useValue: trainerService },
        { provide: EnrollmentService, useValue: enrollmentService },
      ],
    }).compile();
    usecase = moduleRef.get(FinanceAnalyticsUsecase);
  });

  it('总支出包含工资', async () => {
    receiptService.totalCents.mockResolvedValue(1250050);
    expenseService.totalCents.mockResolvedValue(200025);
    payrollService.totalCents.mockResolvedValue(300000);

    await expect(usecase.summary()).resolves.toEqual({
      totalIncome: 12500.5,
      totalExpense: 5000.25,
      netProfit: 7500.25,
    });
  });

  it('按月合并收入、支出与工资并排序', async () => {
    receiptService.monthlyCents.mockResolvedValue(
      new Map([
        ['2024-02', 300000],
        ['2024-01', 500000],
      ]),
    );
    expenseService.monthlyCents.mockResolvedValue(new Map([['2024-02', 50000]]));
    payrollService.monthlyCents.mockResolvedValue(new Map([['2024-03', 120000]]));

    await expect(usecase.incomeExpense()).resolves.toEqual([
      { month: '2024-01', income: 5000, expense: 0, payroll: 0, netProfit: 5000 },
      { month: '2024-02', income: 3000, expense: 500, payroll: 0, netProfit: 2500 },
      { month: '2024-03', income: 0, expense: 0, payroll: 1200, netProfit: -1200 },
    ]);
  });

  it('讲师工资按月份倒序汇总', async () => {
    trainerService.getOrThrow.mockResolvedValue({
      id: 5,
      empNo: 'EMP-005',
      user: { firstName: 'Asha', lastName: 'Nair', username: 'asha' },
    });
    payrollService.findByTrainer.mockResolvedValue([
      { month: '2024-02', status: 'Paid', netPay: '18000.50' },
      { month: '2024-01', status: 'Pending', netPay: '17500.25' },
    ]);

    await expect(usecase.trainer(5)).resolves.toEqual({
      trainer: 'Asha Nair',
      empNo: 'EMP-005',
      totalMonths: 2,
      totalPaid: 35500.75,
      records: [
        { month: '2024-02', status: 'Paid', totalPaid: 18000.5 },
        { month: '2024-01', status: 'Pending', totalPaid: 17500.25 },
      ],
    });
  });

  it('课程收入与去重学员数', async () => {
    courseService.getOrThrow.mockResolvedValue({ id: 3, title: 'Basic Tailoring' });
    receiptService.totalCents.mockResolvedValue(900000);
    enrollmentService.countDistinctStudentsByCourse.mockResolvedValue(4);

    await expect(usecase.course(3)).resolves.toEqual({
      course: 'Basic Tailoring',
      totalIncome: 9000,
      activeStudents: 4,
    });
    expect(receiptService.totalCents).toHaveBeenCalledWith(3);
  });
});
