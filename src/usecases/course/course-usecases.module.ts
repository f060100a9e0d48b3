// 文件位置： src/usecases/course/course-usecases.module.ts
import { AppCacheModule } from '@modules/common/cache/cache.module';
import { CourseServiceModule } from '@modules/course/courses/course-service.module';
import { LessonServiceModule } from '@modules/course/lessons/lesson-service.module';
import { Module } from '@nestjs/common';
import { CourseAccessLoader } from './course-access.loader';
import { CreateCourseUsecase } from './courses/create-course.usecase';
import { DeleteCourseUsecase } from './courses/delete-course.usecase';
import { GetCourseUsecase } from './courses/get-course.usecase';
import { ListCoursesUsecase } from './courses/list-courses.usecase';
import { UpdateCourseUsecase } from './courses/update-course.usecase';
import { CreateLessonUsecase } from './lessons/create-lesson.usecase';
import { DeleteLessonUsecase } from './lessons/delete-lesson.usecase';
import { GetLessonUsecase } from './lessons/get-lesson.usecase';
import { LessonWriteLoader } from './lessons/lesson-write.loader';
import { ListLessonsUsecase } from './lessons/list-lessons.usecase';
import { UpdateLessonUsecase } from './lessons/update-lesson.usecase';

const COURSE_USECASES = [
  ListCoursesUsecase,
  GetCourseUsecase,
  CreateCourseUsecase,
  UpdateCourseUsecase,
  DeleteCourseUsecase,
  ListLessonsUsecase,
  GetLessonUsecase,
  CreateLessonUsecase,
  UpdateLessonUsecase,
  DeleteLessonUsecase,
];

/**
 * 课程 / 课时用例模块
 */
@Module({
  imports: [CourseServiceModule, LessonServiceModule, AppCacheModule],
  providers: [CourseAccessLoader, LessonWriteLoader, ...COURSE_USECASES],
  exports: [...COURSE_USECASES],
})
export class CourseUsecasesModule {}
