// src/types/auth/session.types.ts
import { UserRole } from '@app-types/models/user.types';

/**
 * 匿名访问者
 */
export interface AnonymousActor {
  readonly kind: 'anonymous';
}

/**
 * 已认证访问者
 * role 来自请求时的实时用户记录，而非令牌中的快照
 */
export interface UserActor {
  readonly kind: 'user';
  readonly id: number;
  readonly role: UserRole;
}

/**
 * Usecase 层统一会话类型（发起动作的调用方）
 */
export type Actor = AnonymousActor | UserActor;

export const ANONYMOUS: AnonymousActor = Object.freeze({ kind: 'anonymous' });

/**
 * 由 JWT 策略注入 request.user 的已认证用户
 */
export interface AuthenticatedUser {
  readonly id: number;
  readonly username: string;
  readonly role: UserRole;
}

/**
 * 从 request.user 映射到 Actor 的辅助函数
 * 防止不同调用方手动拼装导致字段不一致
 */
export function toActor(user: AuthenticatedUser | null | undefined): Actor {
  if (!user) return ANONYMOUS;
  return { kind: 'user', id: user.id, role: user.role };
}
