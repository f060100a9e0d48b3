// src/modules/common/cache/key-value-course-cache.ts
import type { KeyValueStorePort } from '@core/common/kv/key-value-store.port';
import { randomUUID } from 'crypto';
import { PinoLogger } from 'nestjs-pino';
import {
  COURSE_LIST_KEY,
  courseDetailKey,
  type CacheDecoder,
  type CourseCachePort,
} from './course-cache.port';

export type CourseCacheTtl = {
  readonly detailSeconds: number;
  readonly listSeconds: number;
};

/** 从未失效过的 key 的世代 */
export const INITIAL_GENERATION = '0';

export const generationKey = (key: string): string => `${key}#gen`;

/** 缓存条目：值与写入时读到的世代一起保存 */
type CacheEntry = {
  readonly gen: string;
  readonly value: unknown;
};

const parseEntry = (raw: string): CacheEntry | null => {
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null) return null;
  if (!('gen' in parsed) || typeof parsed.gen !== 'string' || !('value' in parsed)) return null;
  return { gen: parsed.gen, value: parsed.value };
};

/**
 * 基于 KV 存储的读穿透缓存
 * - 每个 key 有一个世代标记，invalidate 时换成新值
 * - 条目只在世代与当前世代一致时算命中；失效前开始的加载即使事后回填，也不会被读到
 * - KV 读写失败只记 warn，读路径降级为直接读库
 */
export class KeyValueCourseCache implements CourseCachePort {
  constructor(
    private readonly store: KeyValueStorePort,
    private readonly ttl: CourseCacheTtl,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(KeyValueCourseCache.name);
  }

  async getOrLoad<T>(
    key: string,
    loader: () => Promise<T | null>,
    decode: CacheDecoder<T>,
  ): Promise<T | null> {
    const gen = await this.readGeneration(key);
    // 世代不可读时无法判断新旧：既不读缓存也不回填
    if (gen === null) return await loader();

    const cached = await this.safeGet(key);
    if (cached !== null) {
      const hit = this.decodeOrNull(key, cached, gen, decode);
      if (hit !== null) return hit;
    }

    const loaded = await loader();
    if (loaded === null) return null;

    const entry: CacheEntry = { gen, value: loaded };
    await this.safeSet(key, JSON.stringify(entry));
    return loaded;
  }

  async invalidate(courseId: number): Promise<void> {
    const keys = [courseDetailKey(courseId), COURSE_LIST_KEY];
    const gen = randomUUID();
    try {
      // 先换世代再删值：删除之后才写回的旧条目也会因世代不符被丢弃
      await Promise.all(keys.map((k) => this.store.set(generationKey(k), gen, this.genTtl())));
      await this.store.del(...keys);
    } catch (error) {
      this.logger.warn({ err: error, keys }, 'Cache invalidate failed');
    }
  }

  private decodeOrNull<T>(
    key: string,
    raw: string,
    gen: string,
    decode: CacheDecoder<T>,
  ): T | null {
    try {
      const entry = parseEntry(raw);
      if (entry === null) {
        this.logger.warn({ key }, 'Cache entry has unexpected shape, reloading');
        return null;
      }
      if (entry.gen !== gen) return null;
      const value = decode(entry.value);
      if (value === null) this.logger.warn({ key }, 'Cache entry has unexpected shape, reloading');
      return value;
    } catch (error) {
      this.logger.warn({ err: error, key }, 'Cache entry is not valid JSON, reloading');
      return null;
    }
  }

  private ttlFor(key: string): number {
    return key === COURSE_LIST_KEY ? this.ttl.listSeconds : this.ttl.detailSeconds;
  }

  /** 世代标记须比任何条目活得久，否则过期后旧条目会被当成当前世代 */
  private genTtl(): number {
    return Math.max(this.ttl.detailSeconds, this.ttl.listSeconds) * 2;
  }

  /**
   * 当前世代；KV 不可用时返回 null
   */
  private async readGeneration(key: string): Promise<string | null> {
    try {
      return (await this.store.get(generationKey(key))) ?? INITIAL_GENERATION;
    } catch (error) {
      this.logger.warn({ err: error, key }, 'Cache read failed, falling back to store');
      return null;
    }
  }

  private async safeGet(key: string): Promise<string | null> {
    try {
      return await this.store.get(key);
    } catch (error) {
      this.logger.warn({ err: error, key }, 'Cache read failed, falling back to store');
      return null;
    }
  }

  private async safeSet(key: string, value: string): Promise<void> {
    try {
      await this.store.set(key, value, this.ttlFor(key));
    } catch (error) {
      this.logger.warn({ err: error, key }, 'Cache write failed');
    }
  }
}
