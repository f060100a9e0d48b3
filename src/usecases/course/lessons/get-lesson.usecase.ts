// src/usecases/course/lessons/get-lesson.usecase.ts
import type { Actor } from '@app-types/auth/session.types';
import type { LessonView } from '@app-types/models/course.types';
import { COURSE_ERROR, DomainError } from '@core/common/errors/domain-error';
import { authorize } from '@core/course/policy/course-access.policy';
import { CourseService } from '@modules/course/courses/course.service';
import { LessonService } from '@modules/course/lessons/lesson.service';
import { Injectable } from '@nestjs/common';
import { toLessonView } from './lesson-view.mapper';

/**
 * 课时详情用例：可见性继承父课程，不可见按 404 处理
 */
@Injectable()
export class GetLessonUsecase {
  constructor(
    private readonly courseService: CourseService,
    private readonly lessonService: LessonService,
  ) {}

  async execute(actor: Actor, lessonId: number): Promise<LessonView> {
    const lesson = await this.lessonService.findById(lessonId);
    const course = lesson ? await this.courseService.findById(lesson.courseId) : null;
    if (!lesson || !course || !authorize(actor, 'read', { kind: 'lesson', course }).allowed) {
      throw new DomainError(COURSE_ERROR.LESSON_NOT_FOUND, 'Lesson not found.', { lessonId });
    }
    return toLessonView(lesson);
  }
}
