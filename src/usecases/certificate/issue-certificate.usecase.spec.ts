// src/usecases/certificate/issue-certificate.usecase.spec.ts
import { EnrollmentStatus } from '@app-types/models/course.types';
import { CERTIFICATE_ERROR } from '@core/common/errors/domain-error';
import { AttendanceService } from '@modules/attendance/attendance.service';
import { CertificateService } from '@modules/certificate/certificate.service';
import { OUTBOX_WRITER } from '@modules/common/integration-events/events.tokens';
import { CourseService } from '@modules/course/course.service';
import { EnrollmentService } from '@modules/course/enrollment.service';
import { StudentService } from '@modules/student/student.service';
import { Test } from '@nestjs/testing';
import { PinoLogger } from 'nestjs-pino';
import { DataSource } from 'typeorm';
import {
  CERTIFICATE_EXISTS_MESSAGE,
  IssueCertificateUsecase,
  NO_ENROLLMENT_MESSAGE,
} from './issue-certificate.usecase';

describe('IssueCertificateUsecase', () => {
  const manager = { tag: 'tx' };
  const dataSource = { transaction: jest.fn() };
  const certificateService = {
    findValid: jest.fn(),
    findLastCertificateNo: jest.fn(),
    create: jest.fn(),
    getOrThrow: jest.fn(),
  };
  const studentService = { getOrThrow: jest.fn() };
  const courseService = { getOrThrow: jest.fn() };
  const enrollmentService = { findByStudentCourseStatus: jest.fn() };
  const attendanceService = { presentDaysFor: jest.fn() };
  const outboxWriter = { enqueue: jest.fn() };
  const logger = { setContext: jest.fn(), info: jest.fn() };
  let usecase: IssueCertificateUsecase;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        IssueCertificateUsecase,
        { provide: DataSource, useValue: dataSource },
        { provide: CertificateService, useValue: certificateService },
        { provide: StudentService, useValue: studentService },
        { provide: CourseService, useValue: courseService },
        { provide: EnrollmentService, useValue: enrollmentService },
        { provide: AttendanceService, useValue: attendanceService },
        { provide: OUTBOX_WRITER, useValue: outboxWriter },
        { provide: PinoLogger, useValue: logger },
      ],
    }).compile();
    usecase = moduleRef.get(IssueCertificateUsecase);
    dataSource.transaction.mockImplementation((work: (m: typeof manager) => Promise<unknown>) =>
      work(manager),
    );
    studentService.getOrThrow.mockResolvedValue({ id: 7 });
    courseService.getOrThrow.mockResolvedValue({ id: 3, requiredAttendanceDays: 20 });
  });

  it('已有有效证书时返回冲突', async () => {
    certificateService.findValid.mockResolvedValue({ id: 1 });

    await expect(usecase.execute({ studentId: 7, courseId: 3 })).rejects.toMatchObject({
      code: CERTIFICATE_ERROR.CERTIFICATE_ALREADY_EXISTS,
      message: CERTIFICATE_EXISTS_MESSAGE,
    });
  });

  it('只有进行中报名时提示出勤进度', async () => {
    certificateService.findValid.mockResolvedValue(null);
    enrollmentService.findByStudentCourseStatus.mockImplementation(
      (_studentId: number, _courseId: number, status: EnrollmentStatus) =>
        Promise.resolve(status === EnrollmentStatus.ACTIVE ? { batchId: 2 } : null),
    );
    attendanceService.presentDaysFor.mockResolvedValue(12);

    await expect(usecase.execute({ studentId: 7, courseId: 3 })).rejects.toMatchObject({
      code: CERTIFICATE_ERROR.COURSE_NOT_COMPLETED,
      message: 'Student has not completed this course. Attendance: 12/20 days.',
    });
    expect(attendanceService.presentDaysFor).toHaveBeenCalledWith(7, 2);
  });

  it('没有任何报名时拒绝', async () => {
    certificateService.findValid.mockResolvedValue(null);
    enrollmentService.findByStudentCourseStatus.mockResolvedValue(null);

    await expect(usecase.execute({ studentId: 7, courseId: 3 })).rejects.toMatchObject({
      code: CERTIFICATE_ERROR.NO_ENROLLMENT,
      message: NO_ENROLLMENT_MESSAGE,
    });
  });

  it('按当日序号生成编号并发布 CertificateIssued', async () => {
    certificateService.findValid.mockResolvedValue(null);
    enrollmentService.findByStudentCourseStatus.mockResolvedValue({ id: 11 });
    certificateService.findLastCertificateNo.mockResolvedValue('CERT-20240601-0002');
    certificateService.create.mockResolvedValue({ id: 55, certificateNo: 'CERT-20240601-0003' });
    certificateService.getOrThrow.mockResolvedValue({ id: 55 });

    await usecase.execute({ studentId: 7, courseId: 3, issueDate: '2024-06-01', remarks: 'Distinction' });

    expect(certificateService.findLastCertificateNo).toHaveBeenCalledWith('CERT-20240601-', manager);
    expect(certificateService.create).toHaveBeenCalledWith(
      {
        certificateNo: 'CERT-20240601-0003',
        studentId: 7,
        courseId: 3,
        issueDate: '2024-06-01',
        remarks: 'Distinction',
      },
      manager,
    );
    expect(outboxWriter.enqueue.mock.calls[0][0].envelope).toMatchObject({
      type: 'CertificateIssued',
      payload: { certificateId: 55 },
    });
  });
});
