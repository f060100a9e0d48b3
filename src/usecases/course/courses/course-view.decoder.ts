// src/usecases/course/courses/course-view.decoder.ts
import type { CourseView } from '@app-types/models/course.types';

const isRecord = (raw: unknown): raw is Record<string, unknown> =>
  typeof raw === 'object' && raw !== null && !Array.isArray(raw);

/**
 * 从缓存 JSON 还原课程读模型；结构不符时返回 null（按未命中处理）
 */
export function decodeCourseView(raw: unknown): CourseView | null {
  if (!isRecord(raw)) return null;
  const {
    id,
    title,
    description,
    price,
    is_published: isPublished,
    owner,
    owner_id: ownerId,
    created_at: createdAt,
    lessons_count: lessonsCount,
  } = raw;
  if (typeof id !== 'number' || typeof title !== 'string') return null;
  if (typeof description !== 'string' || typeof price !== 'string') return null;
  if (typeof isPublished !== 'boolean' || typeof ownerId !== 'number') return null;
  if (owner !== null && typeof owner !== 'string') return null;
  if (typeof createdAt !== 'string' || typeof lessonsCount !== 'number') return null;
  return {
    id,
    title,
    description,
    price,
    is_published: isPublished,
    owner,
    owner_id: ownerId,
    created_at: createdAt,
    lessons_count: lessonsCount,
  };
}

/**
 * 列表版本：任一元素不合法即整体视为未命中
 */
export function decodeCourseViews(raw: unknown): CourseView[] | null {
  if (!Array.isArray(raw)) return null;
  const views: CourseView[] = [];
  for (const item of raw) {
    const view = decodeCourseView(item);
    if (!view) return null;
    views.push(view);
  }
  return views;
}
