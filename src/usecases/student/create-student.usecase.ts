// src/usecases/student/create-student.usecase.ts
import { type UsecaseSession } from '@app-types/auth/session.types';
import { todayString } from '@core/common/date/date.helper';
import { DomainError, STUDENT_ERROR } from '@core/common/errors/domain-error';
import { PasswordPolicyService } from '@core/common/password/password-policy.service';
import { buildRegNo, isAdmissionDateInFuture, regNoPrefix } from '@core/student/student.policy';
import { UserService } from '@modules/account/user.service';
import { StudentEntity } from '@modules/student/student.entity';
import { StudentService } from '@modules/student/student.service';
import { Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';
import { DataSource } from 'typeorm';

export const USER_PAYLOAD_REQUIRED_MESSAGE = 'This field is required to create a new student.';
export const ADMISSION_DATE_FUTURE_MESSAGE = 'Admission date cannot be in the future.';

export interface StudentUserPayload {
  readonly username: string;
  readonly password: string;
  readonly email?: string;
  readonly firstName?: string;
  readonly lastName?: string;
  readonly phone?: string;
}

export interface CreateStudentInput {
  readonly userPayload?: StudentUserPayload | null;
  readonly guardianName?: string;
  readonly guardianPhone?: string;
  readonly admissionDate?: string;
  readonly address?: string | null;
  readonly active?: boolean;
}

/** 入学日期晚于今天时抛出 */
export function assertAdmissionDate(admissionDate: string, now: Date): void {
  if (isAdmissionDateInFuture(admissionDate, todayString(now))) {
    throw new DomainError(STUDENT_ERROR.ADMISSION_DATE_IN_FUTURE, ADMISSION_DATE_FUTURE_MESSAGE, {
      admissionDate,
    });
  }
}

/**
 * 新建学员：在同一事务内创建登录用户（非员工）与学员档案
 */
@Injectable()
export class CreateStudentUsecase {
  constructor(
    private readonly dataSource: DataSource,
    private readonly userService: UserService,
    private readonly studentService: StudentService,
    private readonly passwordPolicy: PasswordPolicyService,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(CreateStudentUsecase.name);
  }

  async execute(
    session: UsecaseSession,
    input: CreateStudentInput,
    now: Date = new Date(),
  ): Promise<StudentEntity> {
    const payload = input.userPayload;
    if (!payload) {
      throw new DomainError(STUDENT_ERROR.USER_PAYLOAD_REQUIRED, USER_PAYLOAD_REQUIRED_MESSAGE, {
        field: 'userPayload',
      });
    }
    const admissionDate = input.admissionDate ?? todayString(now);
    assertAdmissionDate(admissionDate, now);
    this.passwordPolicy.assertValid(payload.password);

    const created = await this.dataSource.transaction(async (manager) => {
      const user = await this.userService.create(
        { ...payload, isStaff: false, isSuperuser: false, isActive: true },
        session.username,
        manager,
      );
      const lastRegNo = await this.studentService.findLastRegNo(regNoPrefix(now.getFullYear()), manager);
      return this.studentService.create(
        {
          userId: user.id,
          regNo: buildRegNo(now.getFullYear(), lastRegNo),
          guardianName: input.guardianName,
          guardianPhone: input.guardianPhone,
          admissionDate,
          address: input.address,
          active: input.active,
        },
        session.username,
        manager,
      );
    });

    this.logger.info({ studentId: created.id, regNo: created.regNo }, '学员已创建');
    return this.studentService.getOrThrow(created.id);
  }
}
