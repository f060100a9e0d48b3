// test/utils/e2e-app.ts

import type { UserRole } from '@app-types/models/user.types';
import { PasswordPbkdf2Helper } from '@core/common/password/password.pbkdf2.helper';
import { TokenHelper } from '@core/common/token/token.helper';
import { configureApp } from '@core/http/configure-app';
import { UserService } from '@modules/user/user.service';
import { INestApplication } from '@nestjs/common';
import { Test, TestingModule, TestingModuleBuilder } from '@nestjs/testing';
import type { App } from 'supertest/types';
import { AppModule } from '../../src/app.module';

export const API = '/api/v1';

/** e2e 账号共用的测试密码 */
export const TEST_PASSWORD = 'test-password-123';

export interface E2eContext {
  readonly app: INestApplication<App>;
  readonly moduleRef: TestingModule;
}

export interface TestAccount {
  readonly id: number;
  readonly username: string;
  readonly role: UserRole;
  /** 访问令牌，直接放进 Authorization 头 */
  readonly bearer: string;
}

/**
 * 启动完整应用（内存 SQLite + 内存 KV），与生产入口共用 configureApp
 * @param customize 可选：编译前替换 provider（例如注入故障 KV 存储）
 */
export async function createE2eApp(
  customize: (builder: TestingModuleBuilder) => TestingModuleBuilder = (builder) => builder,
): Promise<E2eContext> {
  const moduleRef = await customize(Test.createTestingModule({ imports: [AppModule] })).compile();
  const app = moduleRef.createNestApplication<INestApplication<App>>();
  configureApp(app);
  await app.init();
  return { app, moduleRef };
}

/**
 * 直接写库创建账号并签发访问令牌（admin 无法自助注册）
 */
export async function createAccount(
  ctx: E2eContext,
  username: string,
  role: UserRole,
): Promise<TestAccount> {
  const salt = PasswordPbkdf2Helper.generateSalt();
  const user = await ctx.app.get(UserService).create({
    username,
    email: `${username}@example.com`,
    passwordSalt: salt,
    passwordHash: PasswordPbkdf2Helper.hashPassword(TEST_PASSWORD, salt),
    role,
  });
  const token = ctx.app.get(TokenHelper).generateAccessToken({ id: user.id, username });
  return { id: user.id, username, role: user.role, bearer: `Bearer ${token}` };
}
