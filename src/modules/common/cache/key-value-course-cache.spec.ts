/* eslint-disable max-lines-per-function */
// src/modules/common/cache/key-value-course-cache.spec.ts
import type { KeyValueStorePort } from '@core/common/kv/key-value-store.port';
import { MemoryKeyValueStore } from '@src/infrastructure/kv/memory-key-value-store';
import type { PinoLogger } from 'nestjs-pino';
import { COURSE_LIST_KEY, courseDetailKey } from './course-cache.port';
import { generationKey, KeyValueCourseCache } from './key-value-course-cache';
import { NoopCourseCache } from './noop-course-cache';

type Snapshot = { readonly id: number; readonly title: string };

const decodeSnapshot = (raw: unknown): Snapshot | null =>
  typeof raw === 'object' &&
  raw !== null &&
  'id' in raw &&
  typeof raw.id === 'number' &&
  'title' in raw &&
  typeof raw.title === 'string'
    ? { id: raw.id, title: raw.title }
    : null;

function createLogger() {
  return {
    setContext: jest.fn(),
    warn: jest.fn(),
  };
}

/**
 * 所有操作都抛错的 KV 存储替身
 */
class BrokenStore implements KeyValueStorePort {
  async get(): Promise<string | null> {
    return Promise.reject(new Error('store down'));
  }
  async set(): Promise<void> {
    return Promise.reject(new Error('store down'));
  }
  async setIfAbsent(): Promise<boolean> {
    return Promise.reject(new Error('store down'));
  }
  async del(): Promise<void> {
    return Promise.reject(new Error('store down'));
  }
}

describe('KeyValueCourseCache', () => {
  let store: MemoryKeyValueStore;
  let logger: ReturnType<typeof createLogger>;
  let cache: KeyValueCourseCache;

  beforeEach(() => {
    store = new MemoryKeyValueStore();
    logger = createLogger();
    cache = new KeyValueCourseCache(
      store,
      { detailSeconds: 300, listSeconds: 60 },
      logger as unknown as PinoLogger,
    );
  });

  it('未命中时调用 loader 并回填，命中时不再调用 loader', async () => {
    const loader = jest.fn().mockResolvedValue({ id: 1, title: 'Intro' });

    const first = await cache.getOrLoad(courseDetailKey(1), loader, decodeSnapshot);
    const second = await cache.getOrLoad(courseDetailKey(1), loader, decodeSnapshot);

    expect(first).toEqual({ id: 1, title: 'Intro' });
    expect(second).toEqual({ id: 1, title: 'Intro' });
    expect(loader).toHaveBeenCalledTimes(1);
    expect(await store.get('course:1')).toBe('{"gen":"0","value":{"id":1,"title":"Intro"}}');
  });

  it('loader 返回 null 时不写缓存', async () => {
    const loader = jest.fn().mockResolvedValue(null);

    expect(await cache.getOrLoad(courseDetailKey(9), loader, decodeSnapshot)).toBeNull();
    expect(await store.get('course:9')).toBeNull();
  });

  it('invalidate 同时删除详情与列表 key，并更换两者的世代', async () => {
    await store.set(courseDetailKey(1), '{"gen":"0","value":{"id":1,"title":"Old"}}', 300);
    await store.set(COURSE_LIST_KEY, '{"gen":"0","value":[]}', 300);

    await cache.invalidate(1);

    expect(await store.get('course:1')).toBeNull();
    expect(await store.get('courses:list')).toBeNull();
    const detailGen = await store.get(generationKey('course:1'));
    expect(detailGen).not.toBeNull();
    expect(detailGen).not.toBe('0');
    expect(await store.get('courses:list#gen')).toBe(detailGen);

    const loader = jest.fn().mockResolvedValue({ id: 1, title: 'New' });
    expect(await cache.getOrLoad(courseDetailKey(1), loader, decodeSnapshot)).toEqual({
      id: 1,
      title: 'New',
    });
  });

  it('失效前开始的加载在失效后回填，不会被后续读取读到', async () => {
    let db = 'old';
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const slowLoader = async (): Promise<Snapshot> => {
      const snapshot = { id: 1, title: db };
      await gate;
      return snapshot;
    };

    const inFlight = cache.getOrLoad(courseDetailKey(1), slowLoader, decodeSnapshot);
    // 让在途读取先读完世代与缓存，停在 loader 上
    await new Promise((resolve) => setImmediate(resolve));

    db = 'new';
    await cache.invalidate(1);
    release();
    expect(await inFlight).toEqual({ id: 1, title: 'old' });

    const fresh = jest.fn(async () => ({ id: 1, title: db }));
    expect(await cache.getOrLoad(courseDetailKey(1), fresh, decodeSnapshot)).toEqual({
      id: 1,
      title: 'new',
    });
    expect(fresh).toHaveBeenCalledTimes(1);
  });

  it('旧世代写入的条目按未命中处理', async () => {
    await store.set(generationKey('course:4'), 'gen-b', 600);
    await store.set(courseDetailKey(4), '{"gen":"gen-a","value":{"id":4,"title":"Stale"}}', 300);
    const loader = jest.fn().mockResolvedValue({ id: 4, title: 'Current' });

    expect(await cache.getOrLoad(courseDetailKey(4), loader, decodeSnapshot)).toEqual({
      id: 4,
      title: 'Current',
    });
    expect(await store.get('course:4')).toBe('{"gen":"gen-b","value":{"id":4,"title":"Current"}}');
  });

  it('缓存值结构不符时按未命中处理', async () => {
    await store.set(courseDetailKey(2), '{"gen":"0","value":{"unexpected":true}}', 300);
    const loader = jest.fn().mockResolvedValue({ id: 2, title: 'Fresh' });

    expect(await cache.getOrLoad(courseDetailKey(2), loader, decodeSnapshot)).toEqual({
      id: 2,
      title: 'Fresh',
    });
    expect(loader).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('KV 存储不可用时降级为直接读库，且不抛错', async () => {
    const broken = new KeyValueCourseCache(
      new BrokenStore(),
      { detailSeconds: 300, listSeconds: 300 },
      logger as unknown as PinoLogger,
    );
    const loader = jest.fn().mockResolvedValue({ id: 3, title: 'Direct' });

    await expect(broken.getOrLoad(courseDetailKey(3), loader, decodeSnapshot)).resolves.toEqual({
      id: 3,
      title: 'Direct',
    });
    await expect(broken.invalidate(3)).resolves.toBeUndefined();
    // 读世代失败一次、invalidate 失败一次；世代不可读时不再尝试回填
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(loader).toHaveBeenCalledTimes(1);
  });
});

describe('NoopCourseCache', () => {
  it('每次都调用 loader', async () => {
    const cache = new NoopCourseCache();
    const loader = jest.fn().mockResolvedValue({ id: 1, title: 'Intro' });

    await cache.getOrLoad(courseDetailKey(1), loader, decodeSnapshot);
    await cache.getOrLoad(courseDetailKey(1), loader, decodeSnapshot);
    await cache.invalidate(1);

    expect(loader).toHaveBeenCalledTimes(2);
  });
});
