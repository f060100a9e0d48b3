// src/usecases/course/courses/list-courses.usecase.ts
import type { Actor } from '@app-types/auth/session.types';
import {
  paginateRows,
  type PageParams,
  type PageResult,
} from '@app-types/common/pagination.types';
import type { CourseOrdering, CourseView } from '@app-types/models/course.types';
import { courseListScope, isCourseInScope } from '@core/course/policy/course-access.policy';
import { assertPageInRange } from '@core/pagination/pagination.policy';
import { CACHE_TOKENS } from '@modules/common/cache/cache.tokens';
import { COURSE_LIST_KEY, type CourseCachePort } from '@modules/common/cache/course-cache.port';
import { CourseService } from '@modules/course/courses/course.service';
import { Inject, Injectable } from '@nestjs/common';
import { decodeCourseViews } from './course-view.decoder';

export type ListCoursesQuery = {
  readonly search?: string;
  readonly ordering?: CourseOrdering;
  readonly page: PageParams;
};

const compareBy = (ordering: CourseOrdering) => {
  const desc = ordering.startsWith('-');
  const field = desc ? ordering.slice(1) : ordering;
  const sign = desc ? -1 : 1;
  return (a: CourseView, b: CourseView): number => {
    if (field === 'price') return sign * (Number(a.price) - Number(b.price));
    if (a.created_at === b.created_at) return 0;
    return sign * (a.created_at < b.created_at ? -1 : 1);
  };
};

/**
 * 课程列表用例
 * 全量列表读穿透 courses:list 缓存，可见范围、搜索、排序、分页在读取后按 actor 处理
 */
@Injectable()
export class ListCoursesUsecase {
  constructor(
    private readonly courseService: CourseService,
    @Inject(CACHE_TOKENS.COURSE_CACHE)
    private readonly cache: CourseCachePort,
  ) {}

  async execute(actor: Actor, query: ListCoursesQuery): Promise<PageResult<CourseView>> {
    const all =
      (await this.cache.getOrLoad(
        COURSE_LIST_KEY,
        () => this.courseService.findAllViews(),
        decodeCourseViews,
      )) ?? [];

    const scope = courseListScope(actor);
    const keyword = query.search?.trim().toLowerCase() ?? '';

    const rows = all.filter(
      (c) =>
        isCourseInScope(scope, { ownerId: c.owner_id, isPublished: c.is_published }) &&
        (keyword === '' ||
          c.title.toLowerCase().includes(keyword) ||
          c.description.toLowerCase().includes(keyword)),
    );
    // 缓存中的列表已按 -created_at, -id 排好；Array#sort 稳定，平局保持该顺序
    if (query.ordering) rows.sort(compareBy(query.ordering));

    assertPageInRange(rows.length, query.page);
    return paginateRows(rows, query.page);
  }
}
