// src/scripts/seed.ts
// 本地开发数据初始化：管理员、讲师、学生与示例课程（重复执行时跳过已存在的用户）
import 'reflect-metadata';

import { UserRole } from '@app-types/models/user.types';
import { PasswordPbkdf2Helper } from '@core/common/password/password.pbkdf2.helper';
import { AppConfigModule } from '@core/config/config.module';
import { DatabaseModule } from '@core/database/database.module';
import { LoggerModule } from '@core/logger/logger.module';
import { CourseServiceModule } from '@modules/course/courses/course-service.module';
import { CourseService } from '@modules/course/courses/course.service';
import { LessonServiceModule } from '@modules/course/lessons/lesson-service.module';
import { LessonService } from '@modules/course/lessons/lesson.service';
import { UserServiceModule } from '@modules/user/user-service.module';
import { UserService } from '@modules/user/user.service';
import { Module } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { Logger, PinoLogger } from 'nestjs-pino';
import seedData from './seed-data.json';

@Module({
  imports: [
    AppConfigModule,
    LoggerModule,
    DatabaseModule,
    UserServiceModule,
    CourseServiceModule,
    LessonServiceModule,
  ],
})
class SeedModule {}

const toRole = (raw: string): UserRole => {
  const role = Object.values(UserRole).find((r) => r === raw);
  if (!role) throw new Error(`Unknown role in seed data: ${raw}`);
  return role;
};

async function seed(): Promise<void> {
  const app = await NestFactory.createApplicationContext(SeedModule, { bufferLogs: true });
  app.useLogger(app.get(Logger));
  const logger = await app.resolve(PinoLogger);
  logger.setContext('Seed');

  try {
    const users = app.get(UserService);
    const courses = app.get(CourseService);
    const lessons = app.get(LessonService);
    // 所有种子账号共用一个密码，仅用于本地环境
    const password = process.env.SEED_PASSWORD || 'change-me-locally';

    const ids = new Map<string, number>();
    for (const u of seedData.users) {
      const existing = await users.findByUsername(u.username);
      if (existing) {
        ids.set(u.username, existing.id);
        continue;
      }
      const salt = PasswordPbkdf2Helper.generateSalt();
      const created = await users.create({
        username: u.username,
        email: u.email,
        passwordSalt: salt,
        passwordHash: PasswordPbkdf2Helper.hashPassword(password, salt),
        role: toRole(u.role),
      });
      ids.set(u.username, created.id);
      logger.info({ username: u.username, role: u.role }, 'Seed user created');
    }

    // 课程只在首次执行时写入
    const hasCourses = (await courses.findAllViews()).length > 0;
    if (hasCourses) {
      logger.info('Courses already present, skipping course seed');
      return;
    }

    for (const c of seedData.courses) {
      const ownerId = ids.get(c.owner);
      if (ownerId === undefined) throw new Error(`Unknown course owner in seed data: ${c.owner}`);
      const course = await courses.create({
        title: c.title,
        description: c.description,
        price: c.price,
        isPublished: c.isPublished,
        ownerId,
      });
      for (const [index, l] of c.lessons.entries()) {
        await lessons.create({
          courseId: course.id,
          title: l.title,
          content: l.content,
          durationMin: l.durationMin,
          orderIndex: index + 1,
        });
      }
      logger.info({ courseId: course.id, lessons: c.lessons.length }, 'Seed course created');
    }
  } finally {
    await app.close();
  }
}

seed().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Seed failed', error);
  process.exitCode = 1;
});
