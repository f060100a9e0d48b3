// src/modules/common/cache/cache.module.ts
import type { CacheDriver } from '@core/config/cache.config';
import type { KeyValueStorePort } from '@core/common/kv/key-value-store.port';
import { MemoryKeyValueStore } from '@src/infrastructure/kv/memory-key-value-store';
import { RedisKeyValueStore } from '@src/infrastructure/kv/redis-key-value-store';
import { Inject, Injectable, Module, OnModuleDestroy } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { PinoLogger } from 'nestjs-pino';
import { CACHE_TOKENS } from './cache.tokens';
import type { CourseCachePort } from './course-cache.port';
import { KeyValueCourseCache } from './key-value-course-cache';
import { NoopCourseCache } from './noop-course-cache';

/**
 * 模块销毁时关闭 Redis 连接（memory 驱动下无事可做）
 */
@Injectable()
export class RedisConnectionCloser implements OnModuleDestroy {
  constructor(@Inject(CACHE_TOKENS.REDIS_CLIENT) private readonly client: Redis | null) {}

  async onModuleDestroy(): Promise<void> {
    if (!this.client) return;
    // lazyConnect 下从未发出命令的连接直接断开，避免 quit 触发一次连接
    if (this.client.status === 'wait') {
      this.client.disconnect();
      return;
    }
    await this.client.quit();
  }
}

/**
 * 缓存模块
 * - KV_STORE：共享 KV 存储（memory / redis），任务幂等键也使用它
 * - COURSE_CACHE：按 cache.enabled 在启动时选定 KeyValueCourseCache 或 NoopCourseCache
 */
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: CACHE_TOKENS.REDIS_CLIENT,
      inject: [ConfigService],
      useFactory: (config: ConfigService): Redis | null => {
        if (config.get<CacheDriver>('cache.driver') !== 'redis') return null;
        return new Redis(config.get<string>('cache.redisUrl', 'redis://127.0.0.1:6379/0'), {
          lazyConnect: true,
          maxRetriesPerRequest: 1,
        });
      },
    },
    {
      provide: CACHE_TOKENS.KV_STORE,
      inject: [ConfigService, CACHE_TOKENS.REDIS_CLIENT],
      useFactory: (config: ConfigService, client: Redis | null): KeyValueStorePort =>
        client
          ? new RedisKeyValueStore(client, config.get<string>('cache.keyPrefix', ''))
          : new MemoryKeyValueStore(),
    },
    {
      provide: CACHE_TOKENS.COURSE_CACHE,
      inject: [ConfigService, CACHE_TOKENS.KV_STORE, PinoLogger],
      useFactory: (
        config: ConfigService,
        store: KeyValueStorePort,
        logger: PinoLogger,
      ): CourseCachePort => {
        if (!config.get<boolean>('cache.enabled', true)) return new NoopCourseCache();
        return new KeyValueCourseCache(
          store,
          {
            detailSeconds: config.get<number>('cache.detailTtlSeconds', 300),
            listSeconds: config.get<number>('cache.listTtlSeconds', 300),
          },
          logger,
        );
      },
    },
    RedisConnectionCloser,
  ],
  exports: [CACHE_TOKENS.KV_STORE, CACHE_TOKENS.COURSE_CACHE],
})
export class AppCacheModule {}
