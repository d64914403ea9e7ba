// src/usecases/finance/finance-analytics.usecase.ts
import { fromCents, sumCents } from '@core/common/numeric/money';
import { fullName } from '@modules/account/user.entity';
import { CourseService } from '@modules/course/course.service';
import { EnrollmentService } from '@modules/course/enrollment.service';
import { TrainerService } from '@modules/course/trainer.service';
import { ExpenseService } from '@modules/finance/expense.service';
import { FeesReceiptService } from '@modules/finance/fees-receipt.service';
import { PayrollService } from '@modules/finance/payroll.service';
import { Injectable } from '@nestjs/common';

export interface FinanceSummary {
  readonly totalIncome: number;
  /** 支出 + 工资 */
  readonly totalExpense: number;
  readonly netProfit: number;
}

export interface MonthlyFinance {
  readonly month: string;
  readonly income: number;
  readonly expense: number;
  readonly payroll: number;
  readonly netProfit: number;
}

export interface CourseIncome {
  readonly course: string;
  readonly totalIncome: number;
  readonly activeStudents: number;
}

export interface TrainerPayrollRecord {
  readonly month: string;
  readonly status: string;
  readonly totalPaid: number;
}

export interface TrainerPayrollSummary {
  readonly trainer: string;
  readonly empNo: string;
  readonly totalMonths: number;
  readonly totalPaid: number;
  readonly records: TrainerPayrollRecord[];
}

/**
 * 财务报表（只读）
 * 汇总在“分”上完成，输出时转为两位小数
 */
@Injectable()
export class FinanceAnalyticsUsecase {
  constructor(
    private readonly receiptService: FeesReceiptService,
    private readonly expenseService: ExpenseService,
    private readonly payrollService: PayrollService,
    private readonly courseService: CourseService,
    private readonly trainerService: TrainerService,
    private readonly enrollmentService: EnrollmentService,
  ) {}

  async summary(): Promise<FinanceSummary> {
    const [income, expense, payroll] = await Promise.all([
      this.receiptService.totalCents(),
      this.expenseService.totalCents(),
      this.payrollService.totalCents(),
    ]);
    return {
      totalIncome: fromCents(income),
      totalExpense: fromCents(expense + payroll),
      netProfit: fromCents(income - expense - payroll),
    };
  }

  async incomeExpense(): Promise<MonthlyFinance[]> {
    const [income, expense, payroll] = await Promise.all([
      this.receiptService.monthlyCents(),
      this.expenseService.monthlyCents(),
      this.payrollService.monthlyCents(),
    ]);
    const months = new Set<string>([...income.keys(), ...expense.keys(), ...payroll.keys()]);
    return [...months]
      .filter((month) => month !== '')
      .sort()
      .map((month) => {
        const i = income.get(month) ?? 0;
        const e = expense.get(month) ?? 0;
        const p = payroll.get(month) ?? 0;
        return {
          month,
          income: fromCents(i),
          expense: fromCents(e),
          payroll: fromCents(p),
          netProfit: fromCents(i - (e + p)),
        };
      });
  }

  async course(courseId: number): Promise<CourseIncome> {
    const course = await this.courseService.getOrThrow(courseId);
    const [income, activeStudents] = await Promise.all([
      this.receiptService.totalCents(course.id),
      this.enrollmentService.countDistinctStudentsByCourse(course.id),
    ]);
    return { course: course.title, totalIncome: fromCents(income), activeStudents };
  }

  async trainer(trainerId: number): Promise<TrainerPayrollSummary> {
    const trainer = await this.trainerService.getOrThrow(trainerId);
    const payrolls = await this.payrollService.findByTrainer(trainer.id);
    const records = payrolls.map((payroll) => ({
      month: payroll.month,
      status: payroll.status,
      totalPaid: fromCents(sumCents([payroll.netPay])),
    }));
    return {
      trainer: trainer.user ? fullName(trainer.user) : '',
      empNo: trainer.empNo,
      totalMonths: records.length,
      totalPaid: fromCents(sumCents(payrolls.map((payroll) => payroll.netPay))),
      records,
    };
  }
}
