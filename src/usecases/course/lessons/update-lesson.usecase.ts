// src/usecases/course/lessons/update-lesson.usecase.ts
import type { Actor } from '@app-types/auth/session.types';
import type { LessonView } from '@app-types/models/course.types';
import { COURSE_ERROR, DomainError } from '@core/common/errors/domain-error';
import { assertAuthorized } from '@core/course/policy/course-access.policy';
import { CACHE_TOKENS } from '@modules/common/cache/cache.tokens';
import type { CourseCachePort } from '@modules/common/cache/course-cache.port';
import { LessonService } from '@modules/course/lessons/lesson.service';
import { Inject, Injectable } from '@nestjs/common';
import { LessonWriteLoader } from './lesson-write.loader';
import { toLessonView } from './lesson-view.mapper';

export type UpdateLessonInput = {
  readonly title?: string;
  readonly content?: string;
  readonly durationMin?: number;
  readonly orderIndex?: number;
};

/**
 * 更新课时用例（不允许迁移到其他课程）
 */
@Injectable()
export class UpdateLessonUsecase {
  constructor(
    private readonly lessonService: LessonService,
    private readonly writeLoader: LessonWriteLoader,
    @Inject(CACHE_TOKENS.COURSE_CACHE)
    private readonly cache: CourseCachePort,
  ) {}

  async execute(actor: Actor, lessonId: number, input: UpdateLessonInput): Promise<LessonView> {
    const { lesson, course } = await this.writeLoader.load(actor, lessonId);
    assertAuthorized(actor, 'update', { kind: 'lesson', course });

    await this.lessonService.update(lessonId, input);
    await this.cache.invalidate(lesson.courseId);

    const updated = await this.lessonService.findById(lessonId);
    if (!updated) {
      throw new DomainError(COURSE_ERROR.LESSON_NOT_FOUND, 'Lesson not found.', { lessonId });
    }
    return toLessonView(updated);
  }
}
