// src/modules/course/course-service.module.ts
import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { BatchEntity } from './batch.entity';
import { BatchService } from './batch.service';
import { CourseEntity } from './course.entity';
import { CourseService } from './course.service';
import { EnrollmentEntity } from './enrollment.entity';
import { EnrollmentService } from './enrollment.service';
import { TrainerEntity } from './trainer.entity';
import { TrainerService } from './trainer.service';

/**
 * 课程服务模块：课程、讲师、班级、报名
 */
@Module({
  imports: [TypeOrmModule.forFeature([CourseEntity, TrainerEntity, BatchEntity, EnrollmentEntity])],
  providers: [CourseService, TrainerService, BatchService, EnrollmentService],
  exports: [TypeOrmModule, CourseService, TrainerService, BatchService, EnrollmentService],
})
export class CourseServiceModule {}
