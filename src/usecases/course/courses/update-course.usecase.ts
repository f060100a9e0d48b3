// src/usecases/course/courses/update-course.usecase.ts
import type { Actor } from '@app-types/auth/session.types';
import type { CourseView } from '@app-types/models/course.types';
import { COURSE_ERROR, DomainError } from '@core/common/errors/domain-error';
import { assertAuthorized } from '@core/course/policy/course-access.policy';
import { CACHE_TOKENS } from '@modules/common/cache/cache.tokens';
import type { CourseCachePort } from '@modules/common/cache/course-cache.port';
import { CourseService } from '@modules/course/courses/course.service';
import { Inject, Injectable } from '@nestjs/common';
import { CourseAccessLoader } from '../course-access.loader';

export type UpdateCourseInput = {
  readonly title?: string;
  readonly description?: string;
  readonly price?: number;
  readonly isPublished?: boolean;
};

/**
 * 更新课程用例（PUT / PATCH 共用，缺省字段不修改）
 * PUT 只多要求 title：省略的 description / price / is_published 保留原值，不回到默认值
 * 顺序：持久化 -> 失效缓存 -> 返回最新读模型
 */
@Injectable()
export class UpdateCourseUsecase {
  constructor(
    private readonly courseService: CourseService,
    private readonly accessLoader: CourseAccessLoader,
    @Inject(CACHE_TOKENS.COURSE_CACHE)
    private readonly cache: CourseCachePort,
  ) {}

  async execute(actor: Actor, courseId: number, input: UpdateCourseInput): Promise<CourseView> {
    const course = await this.accessLoader.loadForWrite(actor, courseId);
    assertAuthorized(actor, 'update', { kind: 'course', course });

    await this.courseService.update(courseId, {
      title: input.title,
      description: input.description,
      price: input.price === undefined ? undefined : input.price.toFixed(2),
      isPublished: input.isPublished,
    });
    await this.cache.invalidate(courseId);

    const view = await this.courseService.findViewById(courseId);
    if (!view) {
      throw new DomainError(COURSE_ERROR.COURSE_NOT_FOUND, 'Course not found.', { courseId });
    }
    return view;
  }
}
