// src/modules/common/cache/noop-course-cache.ts
import type { CacheDecoder, CourseCachePort } from './course-cache.port';

/**
 * 缓存关闭时的实现：每次都读库，invalidate 不做任何事
 */
export class NoopCourseCache implements CourseCachePort {
  async getOrLoad<T>(
    _key: string,
    loader: () => Promise<T | null>,
    _decode: CacheDecoder<T>,
  ): Promise<T | null> {
    return await loader();
  }

  async invalidate(_courseId: number): Promise<void> {
    await Promise.resolve();
  }
}
