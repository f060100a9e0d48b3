// src/usecases/course/lessons/delete-lesson.usecase.ts
import type { Actor } from '@app-types/auth/session.types';
import { assertAuthorized } from '@core/course/policy/course-access.policy';
import { CACHE_TOKENS } from '@modules/common/cache/cache.tokens';
import type { CourseCachePort } from '@modules/common/cache/course-cache.port';
import { LessonService } from '@modules/course/lessons/lesson.service';
import { Inject, Injectable } from '@nestjs/common';
import { LessonWriteLoader } from './lesson-write.loader';

@Injectable()
export class DeleteLessonUsecase {
  constructor(
    private readonly lessonService: LessonService,
    private readonly writeLoader: LessonWriteLoader,
    @Inject(CACHE_TOKENS.COURSE_CACHE)
    private readonly cache: CourseCachePort,
  ) {}

  async execute(actor: Actor, lessonId: number): Promise<void> {
    const { lesson, course } = await this.writeLoader.load(actor, lessonId);
    assertAuthorized(actor, 'delete', { kind: 'lesson', course });

    await this.lessonService.delete(lessonId);
    await this.cache.invalidate(lesson.courseId);
  }
}
