// src/usecases/course/lessons/list-lessons.usecase.ts
import type { Actor } from '@app-types/auth/session.types';
import type { PageParams, PageResult } from '@app-types/common/pagination.types';
import type { LessonView } from '@app-types/models/course.types';
import { courseListScope } from '@core/course/policy/course-access.policy';
import { assertPageInRange } from '@core/pagination/pagination.policy';
import { CourseService } from '@modules/course/courses/course.service';
import { LessonService } from '@modules/course/lessons/lesson.service';
import { Injectable } from '@nestjs/common';
import { toLessonView } from './lesson-view.mapper';

export type ListLessonsQuery = {
  readonly courseId?: number;
  readonly page: PageParams;
};

/**
 * 课时列表用例：只返回可见课程下的课时，可按课程过滤
 */
@Injectable()
export class ListLessonsUsecase {
  constructor(
    private readonly courseService: CourseService,
    private readonly lessonService: LessonService,
  ) {}

  async execute(actor: Actor, query: ListLessonsQuery): Promise<PageResult<LessonView>> {
    const visibleIds = await this.courseService.findIdsInScope(courseListScope(actor));
    const courseIds =
      query.courseId === undefined
        ? visibleIds
        : visibleIds.filter((id) => id === query.courseId);

    const { items, total } = await this.lessonService.findPage({ courseIds, page: query.page });
    assertPageInRange(total, query.page);
    return {
      count: total,
      page: query.page.page,
      page_size: query.page.pageSize,
      results: items.map(toLessonView),
    };
  }
}
