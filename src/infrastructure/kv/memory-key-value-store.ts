// src/infrastructure/kv/memory-key-value-store.ts
// KeyValueStorePort 的进程内实现：惰性过期，单进程内 setIfAbsent 天然原子

import type { KeyValueStorePort } from '@core/common/kv/key-value-store.port';

type Entry = {
  readonly value: string;
  readonly expiresAt: number; // epoch ms
};

export class MemoryKeyValueStore implements KeyValueStorePort {
  private readonly entries = new Map<string, Entry>();

  /**
   * @param now 时钟（测试中可注入假时钟）
   */
  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<string | null> {
    await Promise.resolve();
    return this.readLive(key)?.value ?? null;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await Promise.resolve();
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    // 检查与写入之间不能出现 await，否则失去原子性
    if (this.readLive(key)) return false;
    this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
    await Promise.resolve();
    return true;
  }

  async del(...keys: ReadonlyArray<string>): Promise<void> {
    await Promise.resolve();
    keys.forEach((key) => this.entries.delete(key));
  }

  /**
   * 当前存活的 key 数量（会顺带清理过期项）
   */
  size(): number {
    for (const key of Array.from(this.entries.keys())) this.readLive(key);
    return this.entries.size;
  }

  private readLive(key: string): Entry | null {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }
}
