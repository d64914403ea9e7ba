// src/usecases/student/create-student.usecase.spec.ts
import { type UsecaseSession } from '@app-types/auth/session.types';
import { STUDENT_ERROR } from '@core/common/errors/domain-error';
import { PasswordPolicyService } from '@core/common/password/password-policy.service';
import { UserService } from '@modules/account/user.service';
import { StudentService } from '@modules/student/student.service';
import { Test } from '@nestjs/testing';
import { PinoLogger } from 'nestjs-pino';
import { DataSource } from 'typeorm';
import {
  ADMISSION_DATE_FUTURE_MESSAGE,
  CreateStudentUsecase,
  USER_PAYLOAD_REQUIRED_MESSAGE,
} from './create-student.usecase';

describe('CreateStudentUsecase', () => {
  const manager = { tag: 'tx' };
  const dataSource = { transaction: jest.fn() };
  const userService = { create: jest.fn() };
  const studentService = { findLastRegNo: jest.fn(), create: jest.fn(), getOrThrow: jest.fn() };
  const logger = { setContext: jest.fn(), info: jest.fn() };
  const session: UsecaseSession = { accountId: 1, username: 'office', roles: ['STAFF'] };
  const now = new Date(2024, 5, 15, 10, 0);
  let usecase: CreateStudentUsecase;

  const userPayload = {
    username: 'priya',
    password: 'stitch#2024',
    email: 'priya@example.com',
    firstName: 'Priya',
    lastName: 'Nair',
    phone: '9876543210',
  };

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        CreateStudentUsecase,
        PasswordPolicyService,
        { provide: DataSource, useValue: dataSource },
        { provide: UserService, useValue: userService },
        { provide: StudentService, useValue: studentService },
        { provide: PinoLogger, useValue: logger },
      ],
    }).compile();
    usecase = moduleRef.get(CreateStudentUsecase);
    dataSource.transaction.mockImplementation((work: (m: typeof manager) => Promise<unknown>) =>
      work(manager),
    );
  });

  it('缺少 userPayload 时拒绝', async () => {
    await expect(usecase.execute(session, { guardianName: 'Ravi' }, now)).rejects.toMatchObject({
      code: STUDENT_ERROR.USER_PAYLOAD_REQUIRED,
      message: USER_PAYLOAD_REQUIRED_MESSAGE,
    });
    expect(dataSource.transaction).not.toHaveBeenCalled();
  });

  it('入学日期晚于今天时拒绝', async () => {
    await expect(
      usecase.execute(session, { userPayload, admissionDate: '2024-06-16' }, now),
    ).rejects.toMatchObject({
      code: STUDENT_ERROR.ADMISSION_DATE_IN_FUTURE,
      message: ADMISSION_DATE_FUTURE_MESSAGE,
    });
  });

  it('事务内创建非员工用户与学员，学号接续当年最大学号', async () => {
    userService.create.mockResolvedValue({ id: 40 });
    studentService.findLastRegNo.mockResolvedValue('STU2024-011');
    studentService.create.mockResolvedValue({ id: 12, regNo: 'STU2024-012' });
    studentService.getOrThrow.mockResolvedValue({ id: 12, regNo: 'STU2024-012' });

    const result = await usecase.execute(session, { userPayload, guardianName: 'Ravi' }, now);

    expect(userService.create).toHaveBeenCalledWith(
      { ...userPayload, isStaff: false, isSuperuser: false, isActive: true },
      'office',
      manager,
    );
    expect(studentService.findLastRegNo).toHaveBeenCalledWith('STU2024-', manager);
    expect(studentService.create).toHaveBeenCalledWith(
      {
        userId: 40,
        regNo: 'STU2024-012',
        guardianName: 'Ravi',
        guardianPhone: undefined,
        admissionDate: '2024-06-15',
        address: undefined,
        active: undefined,
      },
      'office',
      manager,
    );
    expect(result).toEqual({ id: 12, regNo: 'STU2024-012' });
  });
});
