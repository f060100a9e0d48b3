// src/core/config/cache.config.ts

import { registerAs } from '@nestjs/config';

export type CacheDriver = 'memory' | 'redis';

const parseSeconds = (raw: string | undefined, fallback: number): number => {
  const n = Number.parseInt(raw ?? '', 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
};

/**
 * 缓存与共享 KV 存储配置
 * - enabled 只影响课程读缓存；任务幂等键始终写入 KV 存储
 */
export default registerAs('cache', () => ({
  enabled: process.env.CACHE_ENABLED !== 'false',
  driver: (process.env.CACHE_DRIVER === 'redis' ? 'redis' : 'memory') satisfies CacheDriver,
  redisUrl: process.env.REDIS_URL || 'redis://127.0.0.1:6379/0',
  keyPrefix: process.env.CACHE_KEY_PREFIX || '',
  detailTtlSeconds: parseSeconds(process.env.CACHE_DETAIL_TTL_SECONDS, 300),
  listTtlSeconds: parseSeconds(process.env.CACHE_LIST_TTL_SECONDS, 300),
}));
