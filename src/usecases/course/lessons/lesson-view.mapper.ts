// src/usecases/course/lessons/lesson-view.mapper.ts
import type { LessonView } from '@app-types/models/course.types';
import type { LessonEntity } from '@modules/course/lessons/lesson.entity';

export const toLessonView = (lesson: LessonEntity): LessonView => ({
  id: lesson.id,
  course: lesson.courseId,
  title: lesson.title,
  content: lesson.content,
  duration_min: lesson.durationMin,
  order_index: lesson.orderIndex,
});
