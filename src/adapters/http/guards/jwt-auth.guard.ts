// src/adapters/http/guards/jwt-auth.guard.ts

import type { AuthenticatedUser } from '@app-types/auth/session.types';
import { AUTH_ERROR, DomainError } from '@core/common/errors/domain-error';
import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { AuthGuard } from '@nestjs/passport';
import type { Request } from 'express';
import { Observable } from 'rxjs';
import { IS_PUBLIC_KEY } from '../decorators/public.decorator';

const BEARER_PATTERN = /^Bearer\s+\S+/i;

const hasBearerToken = (req: Request): boolean =>
  BEARER_PATTERN.test(req.headers.authorization ?? '');

/**
 * 全局 JWT 认证守卫
 * - @Public() 路由在未携带 Bearer 令牌时以匿名身份放行
 * - 携带令牌时无论是否公开都必须校验通过
 */
@Injectable()
export class JwtAuthGuard extends AuthGuard('jwt') implements CanActivate {
  constructor(private readonly reflector: Reflector) {
    super();
  }

  canActivate(context: ExecutionContext): boolean | Promise<boolean> | Observable<boolean> {
    const isPublic = this.reflector.getAllAndOverride<boolean | undefined>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (isPublic && !hasBearerToken(context.switchToHttp().getRequest<Request>())) {
      return true;
    }
    return super.canActivate(context);
  }

  /**
   * 处理请求验证结果
   * 未携带凭证与凭证无效分别映射为不同错误码（均为 401）
   */
  handleRequest<TUser = AuthenticatedUser>(
    err: Error | null,
    user: TUser | false,
    info: unknown,
    context: ExecutionContext,
  ): TUser {
    if (!err && user) return user;

    if (err instanceof DomainError) throw err;

    const req = context.switchToHttp().getRequest<Request>();
    if (!hasBearerToken(req)) {
      throw new DomainError(
        AUTH_ERROR.AUTHENTICATION_REQUIRED,
        'Authentication credentials were not provided.',
      );
    }
    throw new DomainError(
      AUTH_ERROR.TOKEN_INVALID,
      'Given token not valid for any token type',
      { reason: err?.message ?? (info instanceof Error ? info.message : undefined) },
      err ?? info,
    );
  }
}
