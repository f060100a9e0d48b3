// src/infrastructure/kv/redis-key-value-store.ts
// KeyValueStorePort 的 Redis 实现（ioredis）

import type { KeyValueStorePort } from '@core/common/kv/key-value-store.port';
import type Redis from 'ioredis';

export class RedisKeyValueStore implements KeyValueStorePort {
  /**
   * @param client 已创建的 ioredis 客户端（连接生命周期由模块管理）
   * @param keyPrefix 可选的 key 前缀，用于多环境共用同一 Redis
   */
  constructor(
    private readonly client: Redis,
    private readonly keyPrefix = '',
  ) {}

  async get(key: string): Promise<string | null> {
    return await this.client.get(this.k(key));
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.client.set(this.k(key), value, 'EX', ttlSeconds);
  }

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    // SET key value EX ttl NX：成功返回 'OK'，key 已存在返回 null
    const result = await this.client.set(this.k(key), value, 'EX', ttlSeconds, 'NX');
    return result === 'OK';
  }

  async del(...keys: ReadonlyArray<string>): Promise<void> {
    if (keys.length === 0) return;
    await this.client.del(...keys.map((key) => this.k(key)));
  }

  private k(key: string): string {
    return `${this.keyPrefix}${key}`;
  }
}
