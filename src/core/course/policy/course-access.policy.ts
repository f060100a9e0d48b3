// 文件位置：src/core/course/policy/course-access.policy.ts
import type { Actor, UserActor } from '@app-types/auth/session.types';
import { COURSE_OWNER_ROLES, UserRole } from '@app-types/models/user.types';
import { AUTH_ERROR, DomainError, PERMISSION_ERROR } from '@core/common/errors/domain-error';

export type AccessAction = 'read' | 'create' | 'update' | 'delete';

/**
 * 课程事实：鉴权只需要发布状态与实时 ownerId
 */
export type CourseFacts = {
  readonly ownerId: number;
  readonly isPublished: boolean;
};

/**
 * 受保护资源（实例或集合）
 * lesson 与 lesson-collection 携带父课程事实
 */
export type AccessResource =
  | { readonly kind: 'course'; readonly course: CourseFacts }
  | { readonly kind: 'lesson'; readonly course: CourseFacts }
  | { readonly kind: 'enrollment'; readonly studentId: number }
  | { readonly kind: 'course-collection' }
  | { readonly kind: 'lesson-collection'; readonly course: CourseFacts }
  | { readonly kind: 'enrollment-collection' };

export type DenyReason = 'AUTHENTICATION_REQUIRED' | 'FORBIDDEN';

export type AccessDecision =
  | { readonly allowed: true }
  | { readonly allowed: false; readonly reason: DenyReason };

export type AccessRequest = {
  readonly actor: Actor;
  readonly action: AccessAction;
  readonly resource: AccessResource;
};

/**
 * 规则：applies 命中后由 decide 给出最终结论，不再继续向下匹配
 */
export type AccessRule = {
  readonly name: string;
  readonly applies: (req: AccessRequest) => boolean;
  readonly decide: (req: AccessRequest) => AccessDecision;
};

const ALLOW: AccessDecision = Object.freeze({ allowed: true });
const AUTH_REQUIRED: AccessDecision = Object.freeze({
  allowed: false,
  reason: 'AUTHENTICATION_REQUIRED',
});
const FORBIDDEN: AccessDecision = Object.freeze({ allowed: false, reason: 'FORBIDDEN' });

const allowIf = (ok: boolean): AccessDecision => (ok ? ALLOW : FORBIDDEN);

const asUser = (actor: Actor): UserActor | null => (actor.kind === 'user' ? actor : null);

const isOwner = (actor: Actor, course: CourseFacts): boolean =>
  asUser(actor)?.id === course.ownerId;

/** 课程/课时资源取父课程事实 */
const courseOf = (resource: AccessResource): CourseFacts | null => {
  switch (resource.kind) {
    case 'course':
    case 'lesson':
    case 'lesson-collection':
      return resource.course;
    default:
      return null;
  }
};

/**
 * 有序规则表（自上而下，首个命中的规则给出结论）
 */
export const COURSE_ACCESS_RULES: ReadonlyArray<AccessRule> = [
  {
    name: 'admin-allows-everything',
    applies: ({ actor }) => asUser(actor)?.role === UserRole.ADMIN,
    decide: () => ALLOW,
  },
  {
    name: 'anonymous-cannot-write',
    applies: ({ actor, action }) => actor.kind === 'anonymous' && action !== 'read',
    decide: () => AUTH_REQUIRED,
  },
  {
    name: 'published-or-owner-reads-course-content',
    applies: ({ action, resource }) =>
      action === 'read' && (resource.kind === 'course' || resource.kind === 'lesson'),
    decide: ({ actor, resource }) => {
      const course = courseOf(resource);
      if (!course) return FORBIDDEN;
      return allowIf(course.isPublished || isOwner(actor, course));
    },
  },
  {
    name: 'course-owner-roles-create-course',
    applies: ({ action, resource }) =>
      action === 'create' && resource.kind === 'course-collection',
    decide: ({ actor }) => {
      const user = asUser(actor);
      return allowIf(user !== null && COURSE_OWNER_ROLES.includes(user.role));
    },
  },
  {
    name: 'owner-writes-course-content',
    applies: ({ action, resource }) =>
      ((action === 'update' || action === 'delete') &&
        (resource.kind === 'course' || resource.kind === 'lesson')) ||
      (action === 'create' && resource.kind === 'lesson-collection'),
    decide: ({ actor, resource }) => {
      const course = courseOf(resource);
      // 只看实时 ownerId，不看当前角色：降级后仍保有已拥有课程的写权限
      return allowIf(course !== null && isOwner(actor, course));
    },
  },
  {
    name: 'student-creates-enrollment',
    applies: ({ action, resource }) =>
      action === 'create' && resource.kind === 'enrollment-collection',
    decide: ({ actor }) => allowIf(asUser(actor)?.role === UserRole.STUDENT),
  },
  {
    name: 'enrollment-read-scope',
    applies: ({ action, resource }) =>
      action === 'read' &&
      (resource.kind === 'enrollment' || resource.kind === 'enrollment-collection'),
    decide: ({ actor, resource }) => {
      const user = asUser(actor);
      if (!user) return AUTH_REQUIRED;
      if (user.role === UserRole.INSTRUCTOR) return ALLOW;
      if (user.role !== UserRole.STUDENT) return FORBIDDEN;
      return allowIf(
        resource.kind === 'enrollment-collection' ||
          (resource.kind === 'enrollment' && resource.studentId === user.id),
      );
    },
  },
  {
    name: 'student-deletes-own-enrollment',
    applies: ({ action, resource }) => action === 'delete' && resource.kind === 'enrollment',
    decide: ({ actor, resource }) =>
      allowIf(resource.kind === 'enrollment' && asUser(actor)?.id === resource.studentId),
  },
  {
    name: 'deny-by-default',
    applies: () => true,
    decide: () => FORBIDDEN,
  },
];

/**
 * 鉴权决策（纯函数）
 * @param actor 调用方
 * @param action 动作
 * @param resource 资源
 * @param rules 规则表，默认 COURSE_ACCESS_RULES
 */
export function authorize(
  actor: Actor,
  action: AccessAction,
  resource: AccessResource,
  rules: ReadonlyArray<AccessRule> = COURSE_ACCESS_RULES,
): AccessDecision {
  const req: AccessRequest = { actor, action, resource };
  const rule = rules.find((r) => r.applies(req));
  return rule ? rule.decide(req) : FORBIDDEN;
}

const authenticationRequired = (): DomainError =>
  new DomainError(
    AUTH_ERROR.AUTHENTICATION_REQUIRED,
    'Authentication credentials were not provided.',
  );

/**
 * 要求已认证；匿名时抛出 AUTHENTICATION_REQUIRED
 */
export function requireUser(actor: Actor): UserActor {
  if (actor.kind === 'anonymous') throw authenticationRequired();
  return actor;
}

/**
 * 将拒绝结论转换为领域错误并抛出
 */
export function assertAuthorized(
  actor: Actor,
  action: AccessAction,
  resource: AccessResource,
): void {
  const decision = authorize(actor, action, resource);
  if (decision.allowed) return;
  if (decision.reason === 'AUTHENTICATION_REQUIRED') throw authenticationRequired();
  throw new DomainError(
    PERMISSION_ERROR.FORBIDDEN,
    'You do not have permission to perform this action.',
  );
}

export type CourseListScope =
  | { readonly kind: 'all' }
  | { readonly kind: 'published-or-owned'; readonly ownerId: number }
  | { readonly kind: 'published' };

/**
 * 课程列表可见范围
 */
export function courseListScope(actor: Actor): CourseListScope {
  const user = asUser(actor);
  if (!user) return { kind: 'published' };
  if (user.role === UserRole.ADMIN) return { kind: 'all' };
  return { kind: 'published-or-owned', ownerId: user.id };
}

/**
 * 判断单个课程是否落在可见范围内
 */
export function isCourseInScope(scope: CourseListScope, course: CourseFacts): boolean {
  switch (scope.kind) {
    case 'all':
      return true;
    case 'published':
      return course.isPublished;
    case 'published-or-owned':
      return course.isPublished || course.ownerId === scope.ownerId;
  }
}

export type EnrollmentListScope =
  | { readonly kind: 'all' }
  | { readonly kind: 'own'; readonly studentId: number }
  | { readonly kind: 'none' };

/**
 * 选课列表可见范围：学生仅看自己的，讲师/管理员看全部，匿名不可见
 */
export function enrollmentListScope(actor: Actor): EnrollmentListScope {
  const user = asUser(actor);
  if (!user) return { kind: 'none' };
  if (user.role === UserRole.STUDENT) return { kind: 'own', studentId: user.id };
  return { kind: 'all' };
}
