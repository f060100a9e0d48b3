// src/usecases/course/lessons/lesson-write.loader.ts
import type { Actor } from '@app-types/auth/session.types';
import { COURSE_ERROR, DomainError } from '@core/common/errors/domain-error';
import { requireUser, type CourseFacts } from '@core/course/policy/course-access.policy';
import { CourseService } from '@modules/course/courses/course.service';
import type { LessonEntity } from '@modules/course/lessons/lesson.entity';
import { LessonService } from '@modules/course/lessons/lesson.service';
import { Injectable } from '@nestjs/common';

/**
 * 课时写操作的目标加载：匿名 401 -> 课时不存在 404，附带父课程实时事实
 */
@Injectable()
export class LessonWriteLoader {
  constructor(
    private readonly courseService: CourseService,
    private readonly lessonService: LessonService,
  ) {}

  async load(
    actor: Actor,
    lessonId: number,
  ): Promise<{ readonly lesson: LessonEntity; readonly course: CourseFacts }> {
    requireUser(actor);
    const lesson = await this.lessonService.findById(lessonId);
    const course = lesson ? await this.courseService.findById(lesson.courseId) : null;
    if (!lesson || !course) {
      throw new DomainError(COURSE_ERROR.LESSON_NOT_FOUND, 'Lesson not found.', { lessonId });
    }
    return { lesson, course };
  }
}
