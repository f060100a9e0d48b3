// src/core/common/errors/domain-error.ts
// 领域错误与错误码：跨层共享的核心错误定义

/**
 * 领域错误类
 * 用于表示业务逻辑层的错误，可在 Service、Usecase 和 Adapter 层之间传递
 */
export class DomainError extends Error {
  readonly code: string;
  readonly details?: unknown;
  readonly cause?: unknown;

  constructor(code: string, message: string, details?: unknown, cause?: unknown) {
    super(message);
    this.name = 'DomainError';
    this.code = code;
    this.details = details;
    this.cause = cause;

    // 兼容某些编译目标/测试环境的原型链问题，确保 instanceof 正常
    Object.setPrototypeOf(this, new.target.prototype);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DomainError);
    }
  }

  toJSON() {
    return { name: this.name, code: this.code, message: this.message, details: this.details };
  }
}

// 认证相关错误码（登录/刷新/鉴权）
export const AUTH_ERROR = {
  AUTHENTICATION_REQUIRED: 'AUTHENTICATION_REQUIRED',
  INVALID_CREDENTIALS: 'INVALID_CREDENTIALS',
  TOKEN_INVALID: 'TOKEN_INVALID',
} as const;
Object.freeze(AUTH_ERROR);

// 权限相关错误码（已认证但无权操作）
export const PERMISSION_ERROR = {
  FORBIDDEN: 'FORBIDDEN',
} as const;
Object.freeze(PERMISSION_ERROR);

// 课程 / 课时
export const COURSE_ERROR = {
  COURSE_NOT_FOUND: 'COURSE_NOT_FOUND',
  LESSON_NOT_FOUND: 'LESSON_NOT_FOUND',
} as const;
Object.freeze(COURSE_ERROR);

// 选课
export const ENROLLMENT_ERROR = {
  ENROLLMENT_NOT_FOUND: 'ENROLLMENT_NOT_FOUND',
  DUPLICATE_ENROLLMENT: 'DUPLICATE_ENROLLMENT',
} as const;
Object.freeze(ENROLLMENT_ERROR);

// 账户领域错误码（注册唯一性约束等）
export const ACCOUNT_ERROR = {
  USERNAME_TAKEN: 'USERNAME_TAKEN',
  EMAIL_TAKEN: 'EMAIL_TAKEN',
  USER_NOT_FOUND: 'USER_NOT_FOUND',
} as const;
Object.freeze(ACCOUNT_ERROR);

// 输入校验；details 为字段错误映射
export const VALIDATION_ERROR = {
  VALIDATION_FAILED: 'VALIDATION_FAILED',
} as const;
Object.freeze(VALIDATION_ERROR);

// 分页
export const PAGINATION_ERROR = {
  INVALID_PAGE: 'INVALID_PAGE',
} as const;
Object.freeze(PAGINATION_ERROR);

// 类型辅助
export type AuthErrorCode = (typeof AUTH_ERROR)[keyof typeof AUTH_ERROR];
export type PermissionErrorCode = (typeof PERMISSION_ERROR)[keyof typeof PERMISSION_ERROR];
export type CourseErrorCode = (typeof COURSE_ERROR)[keyof typeof COURSE_ERROR];
export type EnrollmentErrorCode = (typeof ENROLLMENT_ERROR)[keyof typeof ENROLLMENT_ERROR];
export type AccountErrorCode = (typeof ACCOUNT_ERROR)[keyof typeof ACCOUNT_ERROR];
export type ValidationErrorCode = (typeof VALIDATION_ERROR)[keyof typeof VALIDATION_ERROR];
export type PaginationErrorCode = (typeof PAGINATION_ERROR)[keyof typeof PAGINATION_ERROR];

// 类型守卫：统一判断是否为领域错误（兼容多包/反序列化场景）
export const isDomainError = (error: unknown): error is DomainError => {
  if (error instanceof DomainError) return true;
  if (!error || typeof error !== 'object') return false;
  return (
    'name' in error &&
    error.name === 'DomainError' &&
    'code' in error &&
    typeof error.code === 'string'
  );
};
