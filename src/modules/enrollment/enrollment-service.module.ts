// src/modules/enrollment/enrollment-service.module.ts

import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { EnrollmentEntity } from './enrollment.entity';
import { EnrollmentService } from './enrollment.service';

/**
 * Enrollment Service 模块
 */
@Module({
  imports: [TypeOrmModule.forFeature([EnrollmentEntity])],
  providers: [EnrollmentService],
  exports: [EnrollmentService],
})
export class EnrollmentServiceModule {}
