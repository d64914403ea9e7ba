// src/usecases/attendance/attendance-usecases.module.ts
import { AttendanceServiceModule } from '@modules/attendance/attendance-service.module';
import { IntegrationEventsModule } from '@modules/common/integration-events/integration-events.module';
import { CourseServiceModule } from '@modules/course/course-service.module';
import { StudentServiceModule } from '@modules/student/student-service.module';
import { Module } from '@nestjs/common';
import { AttendanceAnalyticsUsecase } from './attendance-analytics.usecase';
import { AttendanceRecordedHandler } from './attendance-recorded.handler';
import { RecordAttendanceUsecase } from './record-attendance.usecase';

@Module({
  imports: [
    AttendanceServiceModule,
    CourseServiceModule,
    StudentServiceModule,
    IntegrationEventsModule,
  ],
  providers: [RecordAttendanceUsecase, AttendanceAnalyticsUsecase, AttendanceRecordedHandler],
  exports: [RecordAttendanceUsecase, AttendanceAnalyticsUsecase, AttendanceRecordedHandler],
})
export class AttendanceUsecasesModule {}
