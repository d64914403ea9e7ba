// src/usecases/course/course-usecases.module.ts
import { CourseServiceModule } from '@modules/course/course-service.module';
import { StudentServiceModule } from '@modules/student/student-service.module';
import { Module } from '@nestjs/common';
import { CreateEnrollmentUsecase } from './create-enrollment.usecase';
import { SaveBatchUsecase } from './save-batch.usecase';

@Module({
  imports: [CourseServiceModule, StudentServiceModule],
  providers: [SaveBatchUsecase, CreateEnrollmentUsecase],
  exports: [SaveBatchUsecase, CreateEnrollmentUsecase],
})
export class CourseUsecasesModule {}
