// src/usecases/enrollment/enrollment-usecases.module.ts
import { IntegrationEventsModule } from '@modules/common/integration-events/integration-events.module';
import { CourseServiceModule } from '@modules/course/courses/course-service.module';
import { EnrollmentServiceModule } from '@modules/enrollment/enrollment-service.module';
import { Module } from '@nestjs/common';
import { CancelEnrollmentUsecase } from './cancel-enrollment.usecase';
import { EnrollStudentUsecase } from './enroll-student.usecase';
import { ListEnrollmentsUsecase } from './list-enrollments.usecase';

/**
 * 选课用例模块
 */
@Module({
  imports: [CourseServiceModule, EnrollmentServiceModule, IntegrationEventsModule],
  providers: [EnrollStudentUsecase, ListEnrollmentsUsecase, CancelEnrollmentUsecase],
  exports: [EnrollStudentUsecase, ListEnrollmentsUsecase, CancelEnrollmentUsecase],
})
export class EnrollmentUsecasesModule {}
