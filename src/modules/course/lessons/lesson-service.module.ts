// src/modules/course/lessons/lesson-service.module.ts

import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { LessonEntity } from './lesson.entity';
import { LessonService } from './lesson.service';

/**
 * Lesson Service 模块
 */
@Module({
  imports: [TypeOrmModule.forFeature([LessonEntity])],
  providers: [LessonService],
  exports: [LessonService],
})
export class LessonServiceModule {}
