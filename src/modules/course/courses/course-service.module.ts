// src/modules/course/courses/course-service.module.ts

import { EnrollmentEntity } from '@modules/enrollment/enrollment.entity';
import { UserEntity } from '@modules/user/user.entity';
import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { LessonEntity } from '../lessons/lesson.entity';
import { CourseEntity } from './course.entity';
import { CourseService } from './course.service';

/**
 * Course Service 模块
 * 读模型组装与级联删除会访问课时、选课、用户表，这里一并注册实体
 */
@Module({
  imports: [TypeOrmModule.forFeature([CourseEntity, LessonEntity, EnrollmentEntity, UserEntity])],
  providers: [CourseService],
  exports: [CourseService],
})
export class CourseServiceModule {}
