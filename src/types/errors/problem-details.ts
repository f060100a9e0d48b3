// src/types/errors/problem-details.ts

/**
 * 字段级校验错误映射，例如 { title: ['Title must be at least 3 characters long.'] }
 */
export type FieldErrors = Readonly<Record<string, ReadonlyArray<string>>>;

/**
 * 统一错误响应体（Problem Details）
 * status 与 HTTP 状态码一致；detail 在字段校验场景下为映射
 */
export interface ProblemDetails {
  readonly type: string;
  readonly title: string;
  readonly status: number;
  readonly detail: string | FieldErrors;
  readonly instance: string;
  readonly timestamp: string;
  // eslint-disable-next-line @typescript-eslint/naming-convention
  readonly request_id: string | null;
}
