// src/modules/student/student-service.module.ts
import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { EnquiryEntity } from './enquiry.entity';
import { EnquiryService } from './enquiry.service';
import { MeasurementEntity } from './measurement.entity';
import { MeasurementService } from './measurement.service';
import { StudentEntity } from './student.entity';
import { StudentService } from './student.service';

/**
 * 学员服务模块：咨询、学员档案、量体记录
 */
@Module({
  imports: [TypeOrmModule.forFeature([EnquiryEntity, StudentEntity, MeasurementEntity])],
  providers: [EnquiryService, StudentService, MeasurementService],
  exports: [TypeOrmModule, EnquiryService, StudentService, MeasurementService],
})
export class StudentServiceModule {}
