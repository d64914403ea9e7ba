// src/usecases/finance/outstanding.usecase.ts
import { type UsecaseSession, isAdminSession } from '@app-types/auth/session.types';
import { DomainError, FINANCE_ERROR } from '@core/common/errors/domain-error';
import { fromCents, toCents } from '@core/common/numeric/money';
import { clampDue } from '@core/finance/finance.policy';
import { fullName } from '@modules/account/user.entity';
import type { UserEntity } from '@modules/account/user.entity';
import { CourseEntity } from '@modules/course/course.entity';
import { BatchService } from '@modules/course/batch.service';
import { CourseService } from '@modules/course/course.service';
import { EnrollmentService } from '@modules/course/enrollment.service';
import { FeesReceiptService, paidKey } from '@modules/finance/fees-receipt.service';
import { StudentService } from '@modules/student/student.service';
import { Injectable } from '@nestjs/common';

export const OUTSTANDING_FORBIDDEN_MESSAGE =
  'You do not have permission to view this financial data.';

export interface StudentCourseDue {
  readonly course: string;
  readonly batch: string;
  readonly totalFees: number;
  readonly paid: number;
  readonly due: number;
}

export interface StudentOutstanding {
  readonly student: string;
  readonly regNo: string;
  readonly courses: StudentCourseDue[];
  readonly totalPaid: number;
  readonly totalDue: number;
}

export interface BatchOutstanding {
  readonly batch: string;
  readonly course: string;
  readonly totalStudents: number;
  readonly totalFees: number;
  readonly totalPaid: number;
  readonly totalDue: number;
  readonly students: Array<{ student: string; regNo: string; paid: number; due: number }>;
}

export interface CourseOutstanding {
  readonly course: string;
  readonly totalStudents: number;
  readonly totalExpected: number;
  readonly totalPaid: number;
  readonly totalDue: number;
}

export interface OverallOutstanding {
  readonly summary: Array<{
    course: string;
    totalStudents: number;
    expected: number;
    paid: number;
    due: number;
  }>;
  readonly grandExpected: number;
  readonly grandPaid: number;
  readonly grandDue: number;
}

interface CourseTotals {
  readonly totalStudents: number;
  readonly expectedCents: number;
  readonly paidCents: number;
}

const nameOf = (user: UserEntity | undefined): string => (user ? fullName(user) : '');

/**
 * 欠费统计
 * 单行欠费不低于 0；班级与全局合计为应收减实收
 */
@Injectable()
export class OutstandingUsecase {
  constructor(
    private readonly receiptService: FeesReceiptService,
    private readonly enrollmentService: EnrollmentService,
    private readonly studentService: StudentService,
    private readonly batchService: BatchService,
    private readonly courseService: CourseService,
  ) {}

  /** 管理员或学员本人 */
  async student(session: UsecaseSession, studentId: number): Promise<StudentOutstanding> {
    if (!isAdminSession(session)) {
      const own = await this.studentService.findByUserId(session.accountId);
      if (!own || own.id !== studentId) {
        throw new DomainError(FINANCE_ERROR.OUTSTANDING_FORBIDDEN, OUTSTANDING_FORBIDDEN_MESSAGE, {
          studentId,
        });
      }
    }

    const student = await this.studentService.getOrThrow(studentId);
    const enrollments = await this.enrollmentService.findByStudent(student.id);
    const ledger =
      enrollments.length > 0
        ? await this.receiptService.paidLedger({ studentIds: [student.id] })
        : new Map<string, number>();

    let totalPaid = 0;
    let totalDue = 0;
    const courses: StudentCourseDue[] = [];
    for (const enrollment of enrollments) {
      const course = enrollment.batch?.course;
      if (!course) continue;
      const fees = toCents(course.totalFees);
      const paid = ledger.get(paidKey(student.id, course.id)) ?? 0;
      const due = clampDue(fees - paid);
      totalPaid += paid;
      totalDue += due;
      courses.push({
        course: course.title,
        batch: enrollment.batch?.code ?? '',
        totalFees: fromCents(fees),
        paid: fromCents(paid),
        due: fromCents(due),
      });
    }

    return {
      student: nameOf(student.user),
      regNo: student.regNo,
      courses,
      totalPaid: fromCents(totalPaid),
      totalDue: fromCents(totalDue),
    };
  }

  async batch(batchId: number): Promise<BatchOutstanding> {
    const batch = await this.batchService.getOrThrow(batchId);
    const [enrollments, paidMap] = await Promise.all([
      this.enrollmentService.findByBatch(batch.id),
      this.receiptService.paidByStudentInBatch(batch.id),
    ]);
    const fee = toCents(batch.course?.totalFees ?? null);

    let totalPaid = 0;
    const students = enrollments.map((enrollment) => {
      const paid = paidMap.get(enrollment.studentId) ?? 0;
      totalPaid += paid;
      return {
        student: nameOf(enrollment.student?.user),
        regNo: enrollment.student?.regNo ?? '',
        paid: fromCents(paid),
        due: fromCents(clampDue(fee - paid)),
      };
    });
    const totalFees = fee * enrollments.length;

    return {
      batch: batch.code,
      course: batch.course?.title ?? '',
      totalStudents: enrollments.length,
      totalFees: fromCents(totalFees),
      totalPaid: fromCents(totalPaid),
      totalDue: fromCents(totalFees - totalPaid),
      students,
    };
  }

  async course(courseId: number): Promise<CourseOutstanding> {
    const course = await this.courseService.getOrThrow(courseId);
    const totals = await this.courseTotals(course);
    return {
      course: course.title,
      totalStudents: totals.totalStudents,
      totalExpected: fromCents(totals.expectedCents),
      totalPaid: fromCents(totals.paidCents),
      totalDue: fromCents(clampDue(totals.expectedCents - totals.paidCents)),
    };
  }

  async overall(): Promise<OverallOutstanding> {
    const courses = await this.courseService.findAll();
    const summary: OverallOutstanding['summary'] = [];
    let grandExpected = 0;
    let grandPaid = 0;
    for (const course of courses) {
      const totals = await this.courseTotals(course);
      summary.push({
        course: course.title,
        totalStudents: totals.totalStudents,
        expected: fromCents(totals.expectedCents),
        paid: fromCents(totals.paidCents),
        due: fromCents(clampDue(totals.expectedCents - totals.paidCents)),
      });
      grandExpected += totals.expectedCents;
      grandPaid += totals.paidCents;
    }
    return {
      summary,
      grandExpected: fromCents(grandExpected),
      grandPaid: fromCents(grandPaid),
      grandDue: fromCents(grandExpected - grandPaid),
    };
  }

  /** 应收按报名人次计，实收为该课程名下全部收据 */
  private async courseTotals(course: CourseEntity): Promise<CourseTotals> {
    const [enrollments, paidCents] = await Promise.all([
      this.enrollmentService.findByCourse(course.id),
      this.receiptService.totalCents(course.id),
    ]);
    return {
      totalStudents: enrollments.length,
      expectedCents: enrollments.length * toCents(course.totalFees),
      paidCents,
    };
  }
}
