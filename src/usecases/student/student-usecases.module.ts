// src/usecases/student/student-usecases.module.ts
import { PasswordModule } from '@core/common/password/password.module';
import { AccountServiceModule } from '@modules/account/account-service.module';
import { StudentServiceModule } from '@modules/student/student-service.module';
import { Module } from '@nestjs/common';
import { CreateStudentUsecase } from './create-student.usecase';
import { UpdateStudentPhotoUsecase } from './update-student-photo.usecase';
import { UpdateStudentUsecase } from './update-student.usecase';

@Module({
  imports: [AccountServiceModule, StudentServiceModule, PasswordModule],
  providers: [CreateStudentUsecase, UpdateStudentUsecase, UpdateStudentPhotoUsecase],
  exports: [CreateStudentUsecase, UpdateStudentUsecase, UpdateStudentPhotoUsecase],
})
export class StudentUsecasesModule {}
