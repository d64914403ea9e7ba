// src/usecases/certificate/certificate-usecases.module.ts
import { AttendanceServiceModule } from '@modules/attendance/attendance-service.module';
import { CertificateServiceModule } from '@modules/certificate/certificate-service.module';
import { IntegrationEventsModule } from '@modules/common/integration-events/integration-events.module';
import { CourseServiceModule } from '@modules/course/course-service.module';
import { StudentServiceModule } from '@modules/student/student-service.module';
import { Module } from '@nestjs/common';
import { CertificateAccessUsecase } from './certificate-access.usecase';
import { CertificateIssuedHandler } from './certificate-issued.handler';
import { IssueCertificateUsecase } from './issue-certificate.usecase';

@Module({
  imports: [
    CertificateServiceModule,
    StudentServiceModule,
    CourseServiceModule,
    AttendanceServiceModule,
    IntegrationEventsModule,
  ],
  providers: [IssueCertificateUsecase, CertificateAccessUsecase, CertificateIssuedHandler],
  exports: [IssueCertificateUsecase, CertificateAccessUsecase, CertificateIssuedHandler],
})
export class CertificateUsecasesModule {}
