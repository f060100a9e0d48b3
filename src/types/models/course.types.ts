// src/types/models/course.types.ts

/**
 * 课程读模型（缓存载荷，未按访问者裁剪）
 * 字段名与 HTTP 输出保持一致（snake_case）
 */
/* eslint-disable @typescript-eslint/naming-convention */
export interface CourseView {
  readonly id: number;
  readonly title: string;
  readonly description: string;
  readonly price: string;
  readonly is_published: boolean;
  readonly owner: string | null;
  readonly owner_id: number;
  readonly created_at: string;
  readonly lessons_count: number;
}

export interface LessonView {
  readonly id: number;
  readonly course: number;
  readonly title: string;
  readonly content: string;
  readonly duration_min: number;
  readonly order_index: number;
}

export interface EnrollmentView {
  readonly id: number;
  readonly student: number;
  readonly course: number;
  readonly created_at: string;
}
/* eslint-enable @typescript-eslint/naming-convention */

/**
 * 课程列表排序字段
 */
export type CourseOrdering = 'created_at' | '-created_at' | 'price' | '-price';

export const COURSE_ORDERINGS: ReadonlyArray<CourseOrdering> = [
  'created_at',
  '-created_at',
  'price',
  '-price',
];

export const isCourseOrdering = (value: unknown): value is CourseOrdering =>
  typeof value === 'string' && COURSE_ORDERINGS.some((o) => o === value);
