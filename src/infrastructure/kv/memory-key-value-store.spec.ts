// src/infrastructure/kv/memory-key-value-store.spec.ts
import { MemoryKeyValueStore } from './memory-key-value-store';

describe('MemoryKeyValueStore', () => {
  let now: number;
  let store: MemoryKeyValueStore;

  beforeEach(() => {
    now = 1_000_000;
    store = new MemoryKeyValueStore(() => now);
  });

  it('set 后在过期前可以读取，过期后返回 null', async () => {
    await store.set('course:1', 'v1', 300);
    expect(await store.get('course:1')).toBe('v1');

    now += 299_999;
    expect(await store.get('course:1')).toBe('v1');

    now += 1;
    expect(await store.get('course:1')).toBeNull();
    expect(store.size()).toBe(0);
  });

  it('setIfAbsent 仅在 key 不存在时成功', async () => {
    expect(await store.setIfAbsent('task:send_email:1', '1', 3600)).toBe(true);
    expect(await store.setIfAbsent('task:send_email:1', '1', 3600)).toBe(false);
    expect(await store.get('task:send_email:1')).toBe('1');
  });

  it('setIfAbsent 在 key 过期后可以再次成功', async () => {
    expect(await store.setIfAbsent('task:send_email:2', '1', 3600)).toBe(true);
    now += 3_600_000;
    expect(await store.setIfAbsent('task:send_email:2', '1', 3600)).toBe(true);
  });

  it('并发 setIfAbsent 只有一个成功', async () => {
    const results = await Promise.all(
      Array.from({ length: 5 }, () => store.setIfAbsent('task:send_email:3', '1', 3600)),
    );
    expect(results.filter(Boolean)).toHaveLength(1);
  });

  it('del 支持一次删除多个 key', async () => {
    await store.set('course:1', 'a', 300);
    await store.set('courses:list', 'b', 300);
    await store.set('course:2', 'c', 300);

    await store.del('course:1', 'courses:list');

    expect(await store.get('course:1')).toBeNull();
    expect(await store.get('courses:list')).toBeNull();
    expect(await store.get('course:2')).toBe('c');
  });
});
