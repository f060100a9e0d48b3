// src/usecases/course/courses/delete-course.usecase.ts
import type { Actor } from '@app-types/auth/session.types';
import { assertAuthorized } from '@core/course/policy/course-access.policy';
import { CACHE_TOKENS } from '@modules/common/cache/cache.tokens';
import type { CourseCachePort } from '@modules/common/cache/course-cache.port';
import { CourseService } from '@modules/course/courses/course.service';
import { Inject, Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';
import { CourseAccessLoader } from '../course-access.loader';

/**
 * 删除课程用例：同一事务内级联删除课时与选课，提交后失效缓存
 */
@Injectable()
export class DeleteCourseUsecase {
  constructor(
    private readonly courseService: CourseService,
    private readonly accessLoader: CourseAccessLoader,
    @Inject(CACHE_TOKENS.COURSE_CACHE)
    private readonly cache: CourseCachePort,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(DeleteCourseUsecase.name);
  }

  async execute(actor: Actor, courseId: number): Promise<void> {
    const course = await this.accessLoader.loadForWrite(actor, courseId);
    assertAuthorized(actor, 'delete', { kind: 'course', course });

    await this.courseService.deleteCascade(courseId);
    await this.cache.invalidate(courseId);
    this.logger.info({ courseId }, 'Course deleted');
  }
}
