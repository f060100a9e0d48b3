// src/core/common/filters/problem-details.filter.ts
import type { FieldErrors, ProblemDetails } from '@app-types/errors/problem-details';
import {
  ACCOUNT_ERROR,
  AUTH_ERROR,
  COURSE_ERROR,
  ENROLLMENT_ERROR,
  isDomainError,
  PAGINATION_ERROR,
  PERMISSION_ERROR,
  VALIDATION_ERROR,
  type DomainError,
} from '@core/common/errors';
import { REQUEST_ID_HEADER } from '@core/config/logger.config';
import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus } from '@nestjs/common';
import type { Request, Response } from 'express';
import { STATUS_CODES } from 'http';
import { PinoLogger } from 'nestjs-pino';

/** 领域错误码 -> HTTP 状态码 */
const STATUS_BY_CODE: Readonly<Record<string, number>> = {
  [AUTH_ERROR.AUTHENTICATION_REQUIRED]: HttpStatus.UNAUTHORIZED,
  [AUTH_ERROR.INVALID_CREDENTIALS]: HttpStatus.UNAUTHORIZED,
  [AUTH_ERROR.TOKEN_INVALID]: HttpStatus.UNAUTHORIZED,

  [PERMISSION_ERROR.FORBIDDEN]: HttpStatus.FORBIDDEN,

  [COURSE_ERROR.COURSE_NOT_FOUND]: HttpStatus.NOT_FOUND,
  [COURSE_ERROR.LESSON_NOT_FOUND]: HttpStatus.NOT_FOUND,
  [ENROLLMENT_ERROR.ENROLLMENT_NOT_FOUND]: HttpStatus.NOT_FOUND,
  [ACCOUNT_ERROR.USER_NOT_FOUND]: HttpStatus.NOT_FOUND,
  [PAGINATION_ERROR.INVALID_PAGE]: HttpStatus.NOT_FOUND,

  [VALIDATION_ERROR.VALIDATION_FAILED]: HttpStatus.BAD_REQUEST,
  [ACCOUNT_ERROR.USERNAME_TAKEN]: HttpStatus.BAD_REQUEST,
  [ACCOUNT_ERROR.EMAIL_TAKEN]: HttpStatus.BAD_REQUEST,
  [ENROLLMENT_ERROR.DUPLICATE_ENROLLMENT]: HttpStatus.BAD_REQUEST,
};

/** details 为字段映射的错误码 */
const FIELD_ERROR_CODES: ReadonlySet<string> = new Set([
  VALIDATION_ERROR.VALIDATION_FAILED,
  ACCOUNT_ERROR.USERNAME_TAKEN,
  ACCOUNT_ERROR.EMAIL_TAKEN,
]);

/** 非字段级错误统一放在 non_field_errors 下 */
const NON_FIELD_ERROR_CODES: ReadonlySet<string> = new Set([
  ENROLLMENT_ERROR.DUPLICATE_ENROLLMENT,
]);

export const INTERNAL_ERROR_DETAIL = 'Internal server error.';

export function isFieldErrors(value: unknown): value is FieldErrors {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  return Object.values(value).every(
    (messages) => Array.isArray(messages) && messages.every((m) => typeof m === 'string'),
  );
}

type Resolved = { readonly status: number; readonly detail: string | FieldErrors };

function resolveDomainError(error: DomainError): Resolved {
  const status = STATUS_BY_CODE[error.code] ?? HttpStatus.INTERNAL_SERVER_ERROR;
  if (FIELD_ERROR_CODES.has(error.code) && isFieldErrors(error.details)) {
    return { status, detail: error.details };
  }
  if (NON_FIELD_ERROR_CODES.has(error.code)) {
    // eslint-disable-next-line @typescript-eslint/naming-convention
    return { status, detail: { non_field_errors: [error.message] } };
  }
  if (status === HttpStatus.INTERNAL_SERVER_ERROR) {
    return { status, detail: INTERNAL_ERROR_DETAIL };
  }
  return { status, detail: error.message };
}

/** 从 HttpException 响应体中提取可读信息 */
function resolveHttpException(exception: HttpException): Resolved {
  const status = exception.getStatus();
  const resp = exception.getResponse();
  if (typeof resp === 'string') return { status, detail: resp };
  if ('message' in resp) {
    const msg = resp.message;
    if (typeof msg === 'string') return { status, detail: msg };
    if (Array.isArray(msg)) return { status, detail: msg.map(String).join(', ') };
  }
  return { status, detail: exception.message };
}

const readRequestId = (res: Response): string | null => {
  const header = res.getHeader(REQUEST_ID_HEADER);
  if (typeof header === 'string') return header;
  if (typeof header === 'number') return String(header);
  return null;
};

/**
 * 全局异常过滤器：所有错误统一输出 Problem Details 结构
 * - DomainError 按错误码映射状态码
 * - Nest HttpException（未知路由、请求体解析失败等）保持原状态码
 * - 其他异常一律 500，记录完整堆栈，响应体不暴露内部信息
 */
@Catch()
export class ProblemDetailsFilter implements ExceptionFilter {
  constructor(private readonly logger: PinoLogger) {
    this.logger.setContext(ProblemDetailsFilter.name);
  }

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const req = ctx.getRequest<Request>();
    const res = ctx.getResponse<Response>();
    const requestId = readRequestId(res);

    const resolved = this.resolve(exception);
    if (resolved.status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        { err: exception, requestId, method: req.method, url: req.originalUrl },
        'Unhandled error while processing request',
      );
    }

    const body: ProblemDetails = {
      type: `https://httpstatuses.com/${resolved.status}`,
      title: STATUS_CODES[resolved.status] ?? 'Error',
      status: resolved.status,
      detail: resolved.detail,
      instance: `${req.protocol}://${req.get('host') ?? 'localhost'}${req.originalUrl}`,
      timestamp: new Date().toISOString(),
      request_id: requestId,
    };
    res.status(resolved.status).json(body);
  }

  private resolve(exception: unknown): Resolved {
    if (isDomainError(exception)) return resolveDomainError(exception);
    if (exception instanceof HttpException) return resolveHttpException(exception);
    return { status: HttpStatus.INTERNAL_SERVER_ERROR, detail: INTERNAL_ERROR_DETAIL };
  }
}
