// src/usecases/course/lessons/create-lesson.usecase.ts
import type { Actor } from '@app-types/auth/session.types';
import type { LessonView } from '@app-types/models/course.types';
import { assertAuthorized } from '@core/course/policy/course-access.policy';
import { CACHE_TOKENS } from '@modules/common/cache/cache.tokens';
import type { CourseCachePort } from '@modules/common/cache/course-cache.port';
import { LessonService } from '@modules/course/lessons/lesson.service';
import { Inject, Injectable } from '@nestjs/common';
import { CourseAccessLoader } from '../course-access.loader';
import { toLessonView } from './lesson-view.mapper';

export type CreateLessonInput = {
  readonly courseId: number;
  readonly title: string;
  readonly content?: string;
  readonly durationMin?: number;
  readonly orderIndex?: number;
};

/**
 * 创建课时用例：父课程必须存在，仅课程 owner（或管理员）可添加
 * 课程读模型携带 lessons_count，写入后失效父课程缓存
 */
@Injectable()
export class CreateLessonUsecase {
  constructor(
    private readonly lessonService: LessonService,
    private readonly accessLoader: CourseAccessLoader,
    @Inject(CACHE_TOKENS.COURSE_CACHE)
    private readonly cache: CourseCachePort,
  ) {}

  async execute(actor: Actor, input: CreateLessonInput): Promise<LessonView> {
    const course = await this.accessLoader.loadForWrite(actor, input.courseId);
    assertAuthorized(actor, 'create', { kind: 'lesson-collection', course });

    const lesson = await this.lessonService.create({
      courseId: course.id,
      title: input.title,
      content: input.content ?? '',
      durationMin: input.durationMin ?? 5,
      orderIndex: input.orderIndex ?? 1,
    });
    await this.cache.invalidate(course.id);
    return toLessonView(lesson);
  }
}
