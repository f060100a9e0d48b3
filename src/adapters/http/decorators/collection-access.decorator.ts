// src/adapters/http/decorators/collection-access.decorator.ts
import type { AccessAction, AccessResource } from '@core/course/policy/course-access.policy';
import { SetMetadata } from '@nestjs/common';

export const COLLECTION_ACCESS_KEY = 'collectionAccess';

/** 不依赖请求体即可判定的集合资源 */
export type CollectionKind = Extract<
  AccessResource,
  { kind: 'course-collection' | 'enrollment-collection' }
>['kind'];

export type CollectionAccessRequirement = {
  readonly action: AccessAction;
  readonly kind: CollectionKind;
};

/**
 * 集合级权限要求，配合 CollectionAccessGuard 使用
 * 守卫先于管道执行，无权调用方不会拿到请求体校验结果
 */
// eslint-disable-next-line @typescript-eslint/naming-convention
export function CollectionAccess(action: AccessAction, kind: CollectionKind): MethodDecorator {
  const requirement: CollectionAccessRequirement = { action, kind };
  return SetMetadata(COLLECTION_ACCESS_KEY, requirement);
}
