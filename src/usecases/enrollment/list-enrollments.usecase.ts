// src/usecases/enrollment/list-enrollments.usecase.ts
import type { Actor } from '@app-types/auth/session.types';
import type { PageParams, PageResult } from '@app-types/common/pagination.types';
import type { EnrollmentView } from '@app-types/models/course.types';
import { assertAuthorized, enrollmentListScope } from '@core/course/policy/course-access.policy';
import { assertPageInRange } from '@core/pagination/pagination.policy';
import { EnrollmentService } from '@modules/enrollment/enrollment.service';
import { Injectable } from '@nestjs/common';
import { toEnrollmentView } from './enrollment-view.mapper';

export type ListEnrollmentsQuery = {
  readonly courseId?: number;
  readonly page: PageParams;
};

/**
 * 选课列表：学生只看自己的记录，讲师 / 管理员看全部
 */
@Injectable()
export class ListEnrollmentsUsecase {
  constructor(private readonly enrollmentService: EnrollmentService) {}

  async execute(actor: Actor, query: ListEnrollmentsQuery): Promise<PageResult<EnrollmentView>> {
    assertAuthorized(actor, 'read', { kind: 'enrollment-collection' });
    const scope = enrollmentListScope(actor);
    if (scope.kind === 'none') {
      return { count: 0, page: query.page.page, page_size: query.page.pageSize, results: [] };
    }

    const { items, total } = await this.enrollmentService.findPage({
      studentId: scope.kind === 'own' ? scope.studentId : undefined,
      courseId: query.courseId,
      page: query.page,
    });
    assertPageInRange(total, query.page);
    return {
      count: total,
      page: query.page.page,
      page_size: query.page.pageSize,
      results: items.map(toEnrollmentView),
    };
  }
}
