// test/05-maintenance.e2e-spec.ts

import type { CourseView } from '@app-types/models/course.types';
import { UserRole } from '@app-types/models/user.types';
import type { IOutboxDispatcherPort } from '@core/common/integration-events/outbox.port';
import { INTEGRATION_EVENTS_TOKENS } from '@modules/common/integration-events/events.tokens';
import { GenerateDailyReportHandler } from '@modules/common/integration-events/handlers/generate-daily-report.handler';
import { MaintenanceScheduler } from '@modules/common/integration-events/maintenance.scheduler';
import { EnrollmentService } from '@modules/enrollment/enrollment.service';
import request from 'supertest';
import {
  API,
  createAccount,
  createE2eApp,
  type E2eContext,
  type TestAccount,
} from './utils/e2e-app';

describe('05-Maintenance 公开课程列表与定时维护任务 (e2e)', () => {
  let ctx: E2eContext;
  let instructor: TestAccount;
  let student: TestAccount;
  let openCourse: CourseView;
  let hiddenDraft: CourseView;

  const http = () => request(ctx.app.getHttpServer());

  const publicTitles = async (auth?: TestAccount): Promise<string[]> => {
    const req = http().get(`${API}/courses-public/`);
    const res = auth ? await req.set('Authorization', auth.bearer) : await req;
    expect(res.status).toBe(200);
    return res.body.results.map((c: CourseView) => c.title);
  };

  beforeAll(async () => {
    ctx = await createE2eApp();
    instructor = await createAccount(ctx, 'maint-ivan', UserRole.INSTRUCTOR);
    student = await createAccount(ctx, 'maint-sam', UserRole.STUDENT);

    const create = async (body: Record<string, unknown>): Promise<CourseView> => {
      const res = await http()
        .post(`${API}/courses/`)
        .set('Authorization', instructor.bearer)
        .send(body)
        .expect(201);
      return res.body;
    };
    openCourse = await create({ title: 'Open Course', is_published: true });
    hiddenDraft = await create({ title: 'Hidden Draft' });
  });

  afterAll(async () => {
    await ctx.app.close();
  });

  describe('GET /courses-public/', () => {
    it('匿名可访问，只返回已发布课程，并带共享缓存头', async () => {
      const res = await http().get(`${API}/courses-public/`).expect(200);
      expect(res.body).toMatchObject({ count: 1, page: 1, page_size: 20 });
      expect(res.body.results.map((c: CourseView) => c.id)).toEqual([openCourse.id]);
      expect(res.headers['cache-control']).toBe('public, max-age=300');
    });

    it('owner 携带令牌访问时同样看不到草稿', async () => {
      expect(await publicTitles(instructor)).toEqual(['Open Course']);
    });

    it('越界页码返回 404，且不带共享缓存头', async () => {
      const res = await http().get(`${API}/courses-public/?page=2`).expect(404);
      expect(res.body.detail).toBe('Invalid page.');
      expect(res.headers['cache-control']).toBeUndefined();
    });

    it('发布草稿后列表立即可见', async () => {
      await http()
        .patch(`${API}/courses/${hiddenDraft.id}/`)
        .set('Authorization', instructor.bearer)
        .send({ is_published: true })
        .expect(200);
      expect(await publicTitles()).toEqual(['Hidden Draft', 'Open Course']);
    });
  });

  describe('定时维护任务', () => {
    const dispatcher = (): IOutboxDispatcherPort =>
      ctx.app.get<IOutboxDispatcherPort>(INTEGRATION_EVENTS_TOKENS.OUTBOX_DISPATCHER_PORT);

    it('清理任务删除课程已不存在的选课，保留正常记录', async () => {
      const enrollments = ctx.app.get(EnrollmentService);
      const kept = await enrollments.create({ studentId: student.id, courseId: openCourse.id });
      const abandoned = await enrollments.create({ studentId: student.id, courseId: 999999 });

      const scheduler = ctx.app.get(MaintenanceScheduler);
      await expect(scheduler.trigger('EnrollmentCleanupRequested')).resolves.toBe(true);
      await expect(dispatcher().dispatchOnce()).resolves.toEqual({ succeeded: 1, retried: 0 });

      await expect(enrollments.findById(abandoned.id)).resolves.toBeNull();
      await expect(enrollments.findById(kept.id)).resolves.toMatchObject({ id: kept.id });
    });

    it('日报任务同一周期只执行一次，统计课程与选课总数', async () => {
      const scheduler = ctx.app.get(MaintenanceScheduler);
      const now = new Date();
      await scheduler.trigger('DailyReportRequested', now);
      await scheduler.trigger('DailyReportRequested', now);
      await expect(dispatcher().dispatchOnce()).resolves.toEqual({ succeeded: 1, retried: 0 });

      await expect(ctx.app.get(GenerateDailyReportHandler).execute()).resolves.toEqual({
        totalCourses: 2,
        totalEnrollments: 1,
      });
    });
  });
});
