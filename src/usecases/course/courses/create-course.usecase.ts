// src/usecases/course/courses/create-course.usecase.ts
import type { Actor } from '@app-types/auth/session.types';
import type { CourseView } from '@app-types/models/course.types';
import { assertAuthorized, requireUser } from '@core/course/policy/course-access.policy';
import { CACHE_TOKENS } from '@modules/common/cache/cache.tokens';
import type { CourseCachePort } from '@modules/common/cache/course-cache.port';
import { CourseService } from '@modules/course/courses/course.service';
import { Inject, Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';

export type CreateCourseInput = {
  readonly title: string;
  readonly description?: string;
  readonly price?: number;
  readonly isPublished?: boolean;
};

/**
 * 创建课程用例：owner 强制为当前用户，持久化后失效列表缓存
 */
@Injectable()
export class CreateCourseUsecase {
  constructor(
    private readonly courseService: CourseService,
    @Inject(CACHE_TOKENS.COURSE_CACHE)
    private readonly cache: CourseCachePort,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(CreateCourseUsecase.name);
  }

  async execute(actor: Actor, input: CreateCourseInput): Promise<CourseView> {
    const user = requireUser(actor);
    assertAuthorized(user, 'create', { kind: 'course-collection' });

    const course = await this.courseService.create({
      title: input.title,
      description: input.description ?? '',
      price: (input.price ?? 0).toFixed(2),
      isPublished: input.isPublished ?? false,
      ownerId: user.id,
    });
    await this.cache.invalidate(course.id);
    this.logger.info({ courseId: course.id, ownerId: user.id }, 'Course created');

    const view = await this.courseService.findViewById(course.id);
    if (!view) throw new Error(`Course ${course.id} vanished right after creation`);
    return view;
  }
}
