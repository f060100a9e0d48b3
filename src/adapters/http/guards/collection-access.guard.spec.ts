// src/adapters/http/guards/collection-access.guard.spec.ts
import type { AuthenticatedUser } from '@app-types/auth/session.types';
import { UserRole } from '@app-types/models/user.types';
import { AUTH_ERROR, PERMISSION_ERROR } from '@core/common/errors/domain-error';
import { ExecutionContext } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { CollectionAccess } from '../decorators/collection-access.decorator';
import { CollectionAccessGuard } from './collection-access.guard';

class SampleController {
  @CollectionAccess('create', 'course-collection')
  createCourse(): void {}

  @CollectionAccess('create', 'enrollment-collection')
  enroll(): void {}

  list(): void {}
}

function createContext(handler: () => void, user?: AuthenticatedUser): ExecutionContext {
  const req = { user };
  return {
    getHandler: () => handler,
    getClass: () => SampleController,
    switchToHttp: () => ({ getRequest: () => req }),
  } as unknown as ExecutionContext;
}

const user = (id: number, role: UserRole): AuthenticatedUser => ({
  id,
  username: `user${id}`,
  role,
});

describe('CollectionAccessGuard', () => {
  const guard = new CollectionAccessGuard(new Reflector());
  const proto = SampleController.prototype;

  it('未标注的处理器直接放行', () => {
    expect(guard.canActivate(createContext(proto.list))).toBe(true);
  });

  it('讲师可以创建课程，学生被拒绝', () => {
    expect(guard.canActivate(createContext(proto.createCourse, user(1, UserRole.INSTRUCTOR)))).toBe(
      true,
    );
    expect(() =>
      guard.canActivate(createContext(proto.createCourse, user(2, UserRole.STUDENT))),
    ).toThrow(expect.objectContaining({ code: PERMISSION_ERROR.FORBIDDEN }));
  });

  it('学生可以选课，讲师被拒绝', () => {
    expect(guard.canActivate(createContext(proto.enroll, user(2, UserRole.STUDENT)))).toBe(true);
    expect(() => guard.canActivate(createContext(proto.enroll, user(1, UserRole.INSTRUCTOR)))).toThrow(
      expect.objectContaining({ code: PERMISSION_ERROR.FORBIDDEN }),
    );
  });

  it('匿名调用方得到 AUTHENTICATION_REQUIRED', () => {
    expect(() => guard.canActivate(createContext(proto.createCourse))).toThrow(
      expect.objectContaining({ code: AUTH_ERROR.AUTHENTICATION_REQUIRED }),
    );
  });
});
