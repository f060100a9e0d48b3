// src/core/common/kv/key-value-store.port.ts

/**
 * 共享 KV 存储端口
 * - 课程读缓存与后台任务幂等键共用
 * - 值统一为字符串，序列化由调用方负责
 */
export interface KeyValueStorePort {
  get(key: string): Promise<string | null>;

  /**
   * 写入并设置过期时间（秒）
   */
  set(key: string, value: string, ttlSeconds: number): Promise<void>;

  /**
   * 原子的「不存在才写入」
   * @returns true 表示本次写入成功；false 表示 key 已存在
   */
  setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean>;

  del(...keys: ReadonlyArray<string>): Promise<void>;
}
