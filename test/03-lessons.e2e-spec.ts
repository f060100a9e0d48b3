// test/03-lessons.e2e-spec.ts

import type { CourseView, LessonView } from '@app-types/models/course.types';
import { UserRole } from '@app-types/models/user.types';
import request from 'supertest';
import {
  API,
  createAccount,
  createE2eApp,
  type E2eContext,
  type TestAccount,
} from './utils/e2e-app';

describe('03-Lessons 课时读写与可见性继承 (e2e)', () => {
  let ctx: E2eContext;
  let owner: TestAccount;
  let other: TestAccount;
  let student: TestAccount;
  let admin: TestAccount;
  let publicCourse: CourseView;
  let draftCourse: CourseView;
  let draftLesson: LessonView;

  const http = () => request(ctx.app.getHttpServer());

  const postCourse = async (body: Record<string, unknown>): Promise<CourseView> => {
    const res = await http()
      .post(`${API}/courses/`)
      .set('Authorization', owner.bearer)
      .send(body)
      .expect(201);
    return res.body;
  };

  const postLesson = async (
    as: TestAccount,
    body: Record<string, unknown>,
  ): Promise<request.Response> =>
    http().post(`${API}/lessons/`).set('Authorization', as.bearer).send(body);

  beforeAll(async () => {
    ctx = await createE2eApp();
    owner = await createAccount(ctx, 'lesson-owner', UserRole.INSTRUCTOR);
    other = await createAccount(ctx, 'lesson-other', UserRole.INSTRUCTOR);
    student = await createAccount(ctx, 'lesson-student', UserRole.STUDENT);
    admin = await createAccount(ctx, 'lesson-admin', UserRole.ADMIN);

    publicCourse = await postCourse({ title: 'Public Lessons', is_published: true });
    draftCourse = await postCourse({ title: 'Draft Lessons' });

    const res = await postLesson(owner, { course: draftCourse.id, title: 'Hidden Lesson' });
    expect(res.status).toBe(201);
    draftLesson = res.body;
  });

  afterAll(async () => {
    await ctx.app.close();
  });

  describe('创建', () => {
    it('owner 创建课时，缺省字段取默认值', async () => {
      const res = await postLesson(owner, { course: publicCourse.id, title: 'Intro' });
      expect(res.status).toBe(201);
      expect(res.body).toEqual({
        id: expect.any(Number),
        course: publicCourse.id,
        title: 'Intro',
        content: '',
        duration_min: 5,
        order_index: 1,
      });
    });

    it('创建后课程 lessons_count 立即更新', async () => {
      const before = await http().get(`${API}/courses/${publicCourse.id}/`).expect(200);
      const count: number = before.body.lessons_count;

      const res = await postLesson(owner, {
        course: publicCourse.id,
        title: 'Second Lesson',
        duration_min: 15,
        order_index: 2,
      });
      expect(res.status).toBe(201);

      const after = await http().get(`${API}/courses/${publicCourse.id}/`).expect(200);
      expect(after.body.lessons_count).toBe(count + 1);
    });

    it('缺少 course 返回 400', async () => {
      const res = await postLesson(owner, { title: 'Orphan' });
      expect(res.status).toBe(400);
      expect(res.body.detail).toEqual({ course: ['This field is required.'] });
    });

    it('duration_min 小于 1 返回 400', async () => {
      const res = await postLesson(owner, {
        course: publicCourse.id,
        title: 'Zero Length',
        duration_min: 0,
      });
      expect(res.status).toBe(400);
      expect(res.body.detail).toEqual({ duration_min: ['Duration must be >= 1 minute.'] });
    });

    it('课程不存在返回 404', async () => {
      const res = await postLesson(owner, { course: 999999, title: 'Nowhere' });
      expect(res.status).toBe(404);
      expect(res.body.detail).toBe('Course not found.');
    });

    it('非 owner 讲师返回 403，学生返回 403', async () => {
      expect((await postLesson(other, { course: publicCourse.id, title: 'Intruder' })).status).toBe(
        403,
      );
      expect(
        (await postLesson(student, { course: publicCourse.id, title: 'Intruder' })).status,
      ).toBe(403);
    });

    it('管理员可为任意课程添加课时', async () => {
      const res = await postLesson(admin, { course: draftCourse.id, title: 'Admin Lesson' });
      expect(res.status).toBe(201);
    });

    it('匿名返回 401', async () => {
      await http()
        .post(`${API}/lessons/`)
        .send({ course: publicCourse.id, title: 'Anonymous' })
        .expect(401);
    });
  });

  describe('读取', () => {
    it('按课程过滤，结果按 order_index 升序', async () => {
      const res = await http().get(`${API}/lessons/?course=${publicCourse.id}`).expect(200);
      const rows: LessonView[] = res.body.results;
      expect(rows.map((l) => [l.title, l.order_index])).toEqual([
        ['Intro', 1],
        ['Second Lesson', 2],
      ]);
    });

    it('匿名与学生看不到草稿课程的课时', async () => {
      const anon = await http().get(`${API}/lessons/?course=${draftCourse.id}`).expect(200);
      expect(anon.body.count).toBe(0);
      await http().get(`${API}/lessons/${draftLesson.id}/`).expect(404);
      await http()
        .get(`${API}/lessons/${draftLesson.id}/`)
        .set('Authorization', student.bearer)
        .expect(404);
    });

    it('owner 可以读取草稿课程的课时', async () => {
      const res = await http()
        .get(`${API}/lessons/${draftLesson.id}/`)
        .set('Authorization', owner.bearer)
        .expect(200);
      expect(res.body.title).toBe('Hidden Lesson');
    });
  });

  describe('更新与删除', () => {
    it('PATCH 仅由 owner 完成，course 字段被忽略', async () => {
      await http()
        .patch(`${API}/lessons/${draftLesson.id}/`)
        .set('Authorization', other.bearer)
        .send({ title: 'Stolen' })
        .expect(403);

      const res = await http()
        .patch(`${API}/lessons/${draftLesson.id}/`)
        .set('Authorization', owner.bearer)
        .send({ title: 'Renamed Lesson', course: publicCourse.id })
        .expect(200);
      expect(res.body).toMatchObject({ title: 'Renamed Lesson', course: draftCourse.id });
    });

    it('删除课时后 lessons_count 减少，课时返回 404', async () => {
      const created = await postLesson(owner, { course: publicCourse.id, title: 'Temporary' });
      const before = await http().get(`${API}/courses/${publicCourse.id}/`).expect(200);

      await http()
        .delete(`${API}/lessons/${created.body.id}/`)
        .set('Authorization', other.bearer)
        .expect(403);
      await http()
        .delete(`${API}/lessons/${created.body.id}/`)
        .set('Authorization', owner.bearer)
        .expect(204);

      await http().get(`${API}/lessons/${created.body.id}/`).expect(404);
      const after = await http().get(`${API}/courses/${publicCourse.id}/`).expect(200);
      expect(after.body.lessons_count).toBe(before.body.lessons_count - 1);
    });
  });
});
