// src/adapters/http/guards/collection-access.guard.ts

import { toActor, type AuthenticatedUser } from '@app-types/auth/session.types';
import { assertAuthorized } from '@core/course/policy/course-access.policy';
import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import type { Request } from 'express';
import {
  COLLECTION_ACCESS_KEY,
  type CollectionAccessRequirement,
} from '../decorators/collection-access.decorator';

/**
 * 集合级权限守卫
 * 读取 @CollectionAccess() 元数据，按课程访问策略判定；拒绝时抛出领域错误
 */
@Injectable()
export class CollectionAccessGuard implements CanActivate {
  constructor(private readonly reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const requirement = this.reflector.get<CollectionAccessRequirement | undefined>(
      COLLECTION_ACCESS_KEY,
      context.getHandler(),
    );
    if (!requirement) return true;

    const req = context.switchToHttp().getRequest<Request & { user?: AuthenticatedUser }>();
    assertAuthorized(toActor(req.user), requirement.action, { kind: requirement.kind });
    return true;
  }
}
