// src/usecases/course/courses/get-course.usecase.ts
import type { Actor } from '@app-types/auth/session.types';
import type { CourseView } from '@app-types/models/course.types';
import { COURSE_ERROR, DomainError } from '@core/common/errors/domain-error';
import { authorize } from '@core/course/policy/course-access.policy';
import { CACHE_TOKENS } from '@modules/common/cache/cache.tokens';
import { courseDetailKey, type CourseCachePort } from '@modules/common/cache/course-cache.port';
import { CourseService } from '@modules/course/courses/course.service';
import { Inject, Injectable } from '@nestjs/common';
import { decodeCourseView } from './course-view.decoder';

/**
 * 课程详情用例：读穿透 course:{id}，读取后再做可见性判定（不可见按 404 处理）
 */
@Injectable()
export class GetCourseUsecase {
  constructor(
    private readonly courseService: CourseService,
    @Inject(CACHE_TOKENS.COURSE_CACHE)
    private readonly cache: CourseCachePort,
  ) {}

  async execute(actor: Actor, courseId: number): Promise<CourseView> {
    const view = await this.cache.getOrLoad(
      courseDetailKey(courseId),
      () => this.courseService.findViewById(courseId),
      decodeCourseView,
    );
    const visible =
      view !== null &&
      authorize(actor, 'read', {
        kind: 'course',
        course: { ownerId: view.owner_id, isPublished: view.is_published },
      }).allowed;
    if (!view || !visible) {
      throw new DomainError(COURSE_ERROR.COURSE_NOT_FOUND, 'Course not found.', { courseId });
    }
    return view;
  }
}
