// src/usecases/student/update-student.usecase.ts
import { type UsecaseSession } from '@app-types/auth/session.types';
import { StudentEntity } from '@modules/student/student.entity';
import { StudentPatch, StudentService } from '@modules/student/student.service';
import { Injectable } from '@nestjs/common';
import { assertAdmissionDate } from './create-student.usecase';

/** 更新学员档案，不涉及关联用户 */
@Injectable()
export class UpdateStudentUsecase {
  constructor(private readonly studentService: StudentService) {}

  async execute(
    session: UsecaseSession,
    id: number,
    patch: StudentPatch,
    now: Date = new Date(),
  ): Promise<StudentEntity> {
    if (patch.admissionDate !== undefined) assertAdmissionDate(patch.admissionDate, now);
    await this.studentService.update(id, patch, session.username);
    return this.studentService.getOrThrow(id);
  }
}
