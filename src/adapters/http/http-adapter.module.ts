// src/adapters/http/http-adapter.module.ts

import { AuthModule } from '@modules/auth/auth.module';
import { Module } from '@nestjs/common';
import { CourseUsecasesModule } from '@src/usecases/course/course-usecases.module';
import { EnrollmentUsecasesModule } from '@src/usecases/enrollment/enrollment-usecases.module';

// Controllers
import { AuthController } from './auth/auth.controller';
import { CourseController } from './courses/course.controller';
import { PublicCourseController } from './courses/public-course.controller';
import { EnrollmentController } from './enrollments/enrollment.controller';
import { HealthController } from './health/health.controller';
import { LessonController } from './lessons/lesson.controller';

/**
 * HTTP 适配器模块
 * 统一挂载 REST 控制器，业务能力全部来自 usecase 模块
 */
@Module({
  imports: [AuthModule, CourseUsecasesModule, EnrollmentUsecasesModule],
  controllers: [
    AuthController,
    CourseController,
    PublicCourseController,
    LessonController,
    EnrollmentController,
    HealthController,
  ],
})
export class HttpAdapterModule {}
