// src/modules/student/student.service.spec.ts
import { STUDENT_ERROR } from '@core/common/errors/domain-error';
import { resolveHttpStatus } from '@core/common/errors/error-status';
import { SearchService } from '@modules/common/search.module';
import { HttpStatus } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { StudentEntity } from './student.entity';
import { StudentService } from './student.service';

describe('StudentService', () => {
  const builder = {
    select: jest.fn(),
    where: jest.fn(),
    orderBy: jest.fn(),
    addOrderBy: jest.fn(),
    limit: jest.fn(),
    getRawOne: jest.fn(),
  };
  const repository = {
    create: jest.fn(),
    save: jest.fn(),
    createQueryBuilder: jest.fn(),
  };
  let service: StudentService;

  beforeEach(async () => {
    repository.create.mockImplementation((data: Partial<StudentEntity>) => ({ ...data }));
    repository.createQueryBuilder.mockReturnValue(builder);
    builder.select.mockReturnValue(builder);
    builder.where.mockReturnValue(builder);
    builder.orderBy.mockReturnValue(builder);
    builder.addOrderBy.mockReturnValue(builder);
    builder.limit.mockReturnValue(builder);
    const moduleRef = await Test.createTestingModule({
      providers: [
        StudentService,
        { provide: getRepositoryToken(StudentEntity), useValue: repository },
        { provide: SearchService, useValue: {} },
      ],
    }).compile();
    service = moduleRef.get(StudentService);
  });

  it('按长度优先取当年最大学号', async () => {
    builder.getRawOne.mockResolvedValue({ regNo: 'STU2024-1000' });

    await expect(service.findLastRegNo('STU2024-')).resolves.toBe('STU2024-1000');
    expect(builder.where).toHaveBeenCalledWith('student.regNo LIKE :prefix', { prefix: 'STU2024-%' });
    expect(builder.orderBy).toHaveBeenCalledWith('LENGTH(student.regNo)', 'DESC');
    expect(builder.addOrderBy).toHaveBeenCalledWith('student.regNo', 'DESC');
    expect(builder.limit).toHaveBeenCalledWith(1);
  });

  it('当年尚无学员时返回 null', async () => {
    builder.getRawOne.mockResolvedValue(undefined);

    await expect(service.findLastRegNo('STU2025-')).resolves.toBeNull();
  });

  it('学号唯一约束冲突转为 409 领域错误', async () => {
    const duplicate = Object.assign(new Error('Duplicate entry'), { driverError: { code: 'ER_DUP_ENTRY' } });
    repository.save.mockRejectedValue(duplicate);

    const error = await service
      .create({ userId: 40, regNo: 'STU2024-004', admissionDate: '2024-06-15' }, 'office')
      .catch((e: unknown) => e);

    expect(error).toMatchObject({
      code: STUDENT_ERROR.REG_NO_ALREADY_EXISTS,
      message: 'Registration number already exists. Please retry.',
      details: { regNo: 'STU2024-004' },
      cause: duplicate,
    });
    expect(resolveHttpStatus(STUDENT_ERROR.REG_NO_ALREADY_EXISTS)).toBe(HttpStatus.CONFLICT);
  });

  it('其他保存错误原样抛出', async () => {
    const failure = new Error('connection lost');
    repository.save.mockRejectedValue(failure);

    await expect(
      service.create({ userId: 40, regNo: 'STU2024-004', admissionDate: '2024-06-15' }, 'office'),
    ).rejects.toBe(failure);
  });
});
