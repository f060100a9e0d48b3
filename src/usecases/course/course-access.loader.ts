// src/usecases/course/course-access.loader.ts
import type { Actor } from '@app-types/auth/session.types';
import { COURSE_ERROR, DomainError } from '@core/common/errors/domain-error';
import { authorize, requireUser } from '@core/course/policy/course-access.policy';
import { CourseEntity } from '@modules/course/courses/course.entity';
import { CourseService } from '@modules/course/courses/course.service';
import { Injectable } from '@nestjs/common';

/**
 * 课程加载 + 访问判定
 * 读路径：不存在或不可见统一返回 404，不暴露草稿课程的存在
 * 写路径：匿名 401 -> 不存在 404 -> 权限由调用方交给策略判定
 */
@Injectable()
export class CourseAccessLoader {
  constructor(private readonly courseService: CourseService) {}

  /**
   * 加载 actor 可读的课程（实时记录，不走缓存）
   */
  async loadReadable(actor: Actor, courseId: number): Promise<CourseEntity> {
    const course = await this.courseService.findById(courseId);
    if (!course || !authorize(actor, 'read', { kind: 'course', course }).allowed) {
      throw new DomainError(COURSE_ERROR.COURSE_NOT_FOUND, 'Course not found.', { courseId });
    }
    return course;
  }

  /**
   * 加载写操作的目标课程：只校验存在性
   */
  async loadForWrite(actor: Actor, courseId: number): Promise<CourseEntity> {
    requireUser(actor);
    const course = await this.courseService.findById(courseId);
    if (!course) {
      throw new DomainError(COURSE_ERROR.COURSE_NOT_FOUND, 'Course not found.', { courseId });
    }
    return course;
  }
}
