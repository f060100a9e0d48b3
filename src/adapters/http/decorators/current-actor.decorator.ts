// src/adapters/http/decorators/current-actor.decorator.ts
import { toActor, type Actor, type AuthenticatedUser } from '@app-types/auth/session.types';
import { REQUEST_ID_HEADER } from '@core/config/logger.config';
import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { Request, Response } from 'express';

/**
 * 获取当前调用方（匿名或已认证用户）的参数装饰器
 */
export const currentActor = createParamDecorator(
  (_data: unknown, context: ExecutionContext): Actor => {
    const req = context.switchToHttp().getRequest<Request & { user?: AuthenticatedUser }>();
    return toActor(req.user);
  },
);

/**
 * 本次请求的关联 ID（pino-http 生成后写入响应头）
 */
export const requestId = createParamDecorator(
  (_data: unknown, context: ExecutionContext): string | undefined => {
    const header = context.switchToHttp().getResponse<Response>().getHeader(REQUEST_ID_HEADER);
    return typeof header === 'string' ? header : undefined;
  },
);
