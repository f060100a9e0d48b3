// src/usecases/enrollment/enrollment-view.mapper.ts
import type { EnrollmentView } from '@app-types/models/course.types';
import type { EnrollmentEntity } from '@modules/enrollment/enrollment.entity';

export const toEnrollmentView = (enrollment: EnrollmentEntity): EnrollmentView => ({
  id: enrollment.id,
  student: enrollment.studentId,
  course: enrollment.courseId,
  created_at: enrollment.createdAt.toISOString(),
});
