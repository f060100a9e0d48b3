// src/modules/common/cache/course-cache.port.ts

/**
 * 缓存值解码器：结构不符时返回 null，按未命中处理
 */
export type CacheDecoder<T> = (raw: unknown) => T | null;

/**
 * 课程读缓存协调器
 * 调用方不感知缓存是否启用（启动时选定实现）
 */
export interface CourseCachePort {
  /**
   * 命中直接返回缓存值；未命中调用 loader 读库并回填
   * loader 返回 null 表示资源不存在，不写入缓存
   */
  getOrLoad<T>(
    key: string,
    loader: () => Promise<T | null>,
    decode: CacheDecoder<T>,
  ): Promise<T | null>;

  /**
   * 写操作持久化之后、返回之前调用：删除详情 key 与列表 key
   */
  invalidate(courseId: number): Promise<void>;
}

export const COURSE_LIST_KEY = 'courses:list';

export const courseDetailKey = (courseId: number): string => `course:${courseId}`;
