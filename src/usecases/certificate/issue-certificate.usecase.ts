// src/usecases/certificate/issue-certificate.usecase.ts
import { EnrollmentStatus } from '@app-types/models/course.types';
import { buildCertificateNo, certificateNoPrefix, notCompletedMessage } from '@core/certificate/certificate.policy';
import { todayString } from '@core/common/date/date.helper';
import { CERTIFICATE_ERROR, DomainError } from '@core/common/errors/domain-error';
import { buildEnvelope } from '@core/common/integration-events/events.types';
import type { IOutboxWriterPort } from '@core/common/integration-events/outbox.port';
import { AttendanceService } from '@modules/attendance/attendance.service';
import { CertificateEntity } from '@modules/certificate/certificate.entity';
import { CertificateService } from '@modules/certificate/certificate.service';
import { OUTBOX_WRITER } from '@modules/common/integration-events/events.tokens';
import { CourseService } from '@modules/course/course.service';
import { EnrollmentService } from '@modules/course/enrollment.service';
import { StudentService } from '@modules/student/student.service';
import { Inject, Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';
import { DataSource } from 'typeorm';

export const CERTIFICATE_EXISTS_MESSAGE = 'A valid certificate already exists for this student and course.';
export const NO_ENROLLMENT_MESSAGE =
  'Student is not enrolled in this course or no active/completed enrollment was found.';

export interface IssueCertificateInput {
  readonly studentId: number;
  readonly courseId: number;
  readonly issueDate?: string;
  readonly remarks?: string;
}

/**
 * 签发证书
 * 要求学员在该课程下有已结课报名，同一学员同一课程只能有一张有效证书
 */
@Injectable()
export class IssueCertificateUsecase {
  constructor(
    private readonly dataSource: DataSource,
    private readonly certificateService: CertificateService,
    private readonly studentService: StudentService,
    private readonly courseService: CourseService,
    private readonly enrollmentService: EnrollmentService,
    private readonly attendanceService: AttendanceService,
    @Inject(OUTBOX_WRITER)
    private readonly outboxWriter: IOutboxWriterPort,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(IssueCertificateUsecase.name);
  }

  async execute(input: IssueCertificateInput): Promise<CertificateEntity> {
    const student = await this.studentService.getOrThrow(input.studentId);
    const course = await this.courseService.getOrThrow(input.courseId);

    if (await this.certificateService.findValid(student.id, course.id)) {
      throw new DomainError(CERTIFICATE_ERROR.CERTIFICATE_ALREADY_EXISTS, CERTIFICATE_EXISTS_MESSAGE, {
        studentId: student.id,
        courseId: course.id,
      });
    }
    await this.assertCompleted(student.id, course.id, course.requiredAttendanceDays);

    const issueDate = input.issueDate ?? todayString();
    const saved = await this.dataSource.transaction(async (manager) => {
      const lastNo = await this.certificateService.findLastCertificateNo(certificateNoPrefix(issueDate), manager);
      const certificate = await this.certificateService.create(
        {
          certificateNo: buildCertificateNo(issueDate, lastNo),
          studentId: student.id,
          courseId: course.id,
          issueDate,
          remarks: input.remarks,
        },
        manager,
      );
      await this.outboxWriter.enqueue({
        envelope: buildEnvelope({
          type: 'CertificateIssued',
          aggregateType: 'Certificate',
          aggregateId: certificate.id,
          payload: { certificateId: certificate.id },
        }),
        tx: { kind: 'tx', opaque: manager },
      });
      return certificate;
    });

    this.logger.info(
      { certificateId: saved.id, certificateNo: saved.certificateNo, studentId: student.id },
      '证书已签发',
    );
    return this.certificateService.getOrThrow(saved.id);
  }

  private async assertCompleted(studentId: number, courseId: number, requiredDays: number): Promise<void> {
    const completed = await this.enrollmentService.findByStudentCourseStatus(
      studentId,
      courseId,
      EnrollmentStatus.COMPLETED,
    );
    if (completed) return;

    const active = await this.enrollmentService.findByStudentCourseStatus(
      studentId,
      courseId,
      EnrollmentStatus.ACTIVE,
    );
    if (active) {
      const present = await this.attendanceService.presentDaysFor(studentId, active.batchId);
      throw new DomainError(
        CERTIFICATE_ERROR.COURSE_NOT_COMPLETED,
        notCompletedMessage(present, requiredDays),
        { studentId, courseId, present, requiredDays },
      );
    }
    throw new DomainError(CERTIFICATE_ERROR.NO_ENROLLMENT, NO_ENROLLMENT_MESSAGE, { studentId, courseId });
  }
}
