// test/01-auth.e2e-spec.ts

import { UserRole } from '@app-types/models/user.types';
import { INVALID_CREDENTIALS_MESSAGE } from '@src/usecases/auth/login-with-password.usecase';
import {
  EMAIL_TAKEN_MESSAGE,
  USERNAME_TAKEN_MESSAGE,
} from '@src/usecases/auth/register-user.usecase';
import request from 'supertest';
import { API, createE2eApp, type E2eContext } from './utils/e2e-app';

const PASSWORD = 'Zebra-Lamp-42';

describe('01-Auth 注册 / 登录 / 刷新 / 当前用户 (e2e)', () => {
  let ctx: E2eContext;

  beforeAll(async () => {
    ctx = await createE2eApp();
    await request(ctx.app.getHttpServer())
      .post(`${API}/auth/register/`)
      .send({ username: 'alice', email: 'alice@example.com', password: PASSWORD })
      .expect(201);
  });

  afterAll(async () => {
    await ctx.app.close();
  });

  const login = (username: string, password: string) =>
    request(ctx.app.getHttpServer()).post(`${API}/auth/login/`).send({ username, password });

  describe('注册', () => {
    it('返回用户资料，角色默认 student', async () => {
      const res = await request(ctx.app.getHttpServer())
        .post(`${API}/auth/register`)
        .send({ username: 'bob', email: 'Bob@Example.com', password: PASSWORD })
        .expect(201);
      expect(res.body).toEqual({
        id: expect.any(Number),
        username: 'bob',
        email: 'bob@example.com',
        role: UserRole.STUDENT,
        date_joined: expect.any(String),
      });
      expect(res.body).not.toHaveProperty('password');
    });

    it('可以注册为 instructor', async () => {
      const res = await request(ctx.app.getHttpServer())
        .post(`${API}/auth/register`)
        .send({ username: 'ivy', email: 'ivy@example.com', password: PASSWORD, role: 'instructor' })
        .expect(201);
      expect(res.body.role).toBe(UserRole.INSTRUCTOR);
    });

    it('不允许自助注册为 admin', async () => {
      const res = await request(ctx.app.getHttpServer())
        .post(`${API}/auth/register`)
        .send({ username: 'mallory', email: 'mallory@example.com', password: PASSWORD, role: 'admin' })
        .expect(400);
      expect(res.body.detail).toEqual({ role: ['Select a valid role.'] });
    });

    it('用户名过短返回字段错误', async () => {
      const res = await request(ctx.app.getHttpServer())
        .post(`${API}/auth/register`)
        .send({ username: 'al', email: 'al@example.com', password: PASSWORD })
        .expect(400);
      expect(res.body.detail).toEqual({
        username: ['Username must be at least 3 characters long.'],
      });
    });

    it('邮箱格式错误返回字段错误', async () => {
      const res = await request(ctx.app.getHttpServer())
        .post(`${API}/auth/register`)
        .send({ username: 'carol', email: 'not-an-email', password: PASSWORD })
        .expect(400);
      expect(res.body.detail).toEqual({ email: ['Enter a valid email address.'] });
    });

    it('用户名与邮箱已占用时返回对应字段错误', async () => {
      const res = await request(ctx.app.getHttpServer())
        .post(`${API}/auth/register`)
        .send({ username: 'alice', email: 'ALICE@example.com', password: PASSWORD })
        .expect(400);
      expect(res.body.detail).toEqual({
        username: [USERNAME_TAKEN_MESSAGE],
        email: [EMAIL_TAKEN_MESSAGE],
      });
    });

    it('纯数字密码被拒绝', async () => {
      const res = await request(ctx.app.getHttpServer())
        .post(`${API}/auth/register`)
        .send({ username: 'dave', email: 'dave@example.com', password: '90817263' })
        .expect(400);
      expect(res.body.detail).toEqual({ password: ['This password is entirely numeric.'] });
    });
  });

  describe('登录与刷新', () => {
    it('正确凭证返回 access / refresh', async () => {
      const res = await login('alice', PASSWORD).expect(200);
      expect(res.body).toEqual({ access: expect.any(String), refresh: expect.any(String) });
    });

    it('错误密码返回 401', async () => {
      const res = await login('alice', 'wrong-password').expect(401);
      expect(res.body.detail).toBe(INVALID_CREDENTIALS_MESSAGE);
    });

    it('refresh 令牌换取新的 access 令牌', async () => {
      const { body } = await login('alice', PASSWORD).expect(200);
      const res = await request(ctx.app.getHttpServer())
        .post(`${API}/auth/refresh/`)
        .send({ refresh: body.refresh })
        .expect(200);
      expect(res.body).toEqual({ access: expect.any(String) });

      await request(ctx.app.getHttpServer())
        .get(`${API}/auth/me/`)
        .set('Authorization', `Bearer ${res.body.access}`)
        .expect(200);
    });

    it('access 令牌不能用于刷新', async () => {
      const { body } = await login('alice', PASSWORD).expect(200);
      await request(ctx.app.getHttpServer())
        .post(`${API}/auth/refresh/`)
        .send({ refresh: body.access })
        .expect(401);
    });

    it('refresh 令牌不能当作 access 令牌使用', async () => {
      const { body } = await login('alice', PASSWORD).expect(200);
      const res = await request(ctx.app.getHttpServer())
        .get(`${API}/auth/me/`)
        .set('Authorization', `Bearer ${body.refresh}`)
        .expect(401);
      expect(res.body.detail).toBe('Given token not valid for any token type');
    });
  });

  describe('当前用户', () => {
    it('返回当前用户资料', async () => {
      const { body } = await login('alice', PASSWORD).expect(200);
      const res = await request(ctx.app.getHttpServer())
        .get(`${API}/auth/me/`)
        .set('Authorization', `Bearer ${body.access}`)
        .expect(200);
      expect(res.body).toMatchObject({ username: 'alice', email: 'alice@example.com', role: 'student' });
    });

    it('未携带凭证返回 401', async () => {
      const res = await request(ctx.app.getHttpServer()).get(`${API}/auth/me/`).expect(401);
      expect(res.body.detail).toBe('Authentication credentials were not provided.');
    });

    it('无效令牌返回 401', async () => {
      await request(ctx.app.getHttpServer())
        .get(`${API}/auth/me/`)
        .set('Authorization', 'Bearer not-a-token')
        .expect(401);
    });
  });
});
