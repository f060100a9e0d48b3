// src/modules/common/cache/cache.tokens.ts
// 缓存相关的 DI token 定义

export const CACHE_TOKENS = {
  KV_STORE: Symbol('CACHE.KV_STORE'),
  COURSE_CACHE: Symbol('CACHE.COURSE_CACHE'),
  REDIS_CLIENT: Symbol('CACHE.REDIS_CLIENT'),
} as const;
