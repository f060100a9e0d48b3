// src/modules/common/integration-events/outbox.memory.service.ts
import type { IntegrationEventEnvelope } from '@core/common/integration-events/events.types';
import type {
  IOutboxStorePort,
  IOutboxWriterPort,
  OutboxReadyItem,
  OutboxSnapshot,
} from '@core/common/integration-events/outbox.port';
import { Injectable } from '@nestjs/common';

type QueuedEvent = {
  readonly envelope: IntegrationEventEnvelope;
  attempts: number;
  nextAttemptAt: number; // epoch ms
};

/**
 * 内存版 Outbox 服务
 * 同时实现 Writer + Store 端口，便于 Dispatcher 仅依赖 Store 抽象
 */
@Injectable()
export class OutboxMemoryService implements IOutboxWriterPort, IOutboxStorePort {
  private readonly queue: QueuedEvent[] = [];
  private readonly failed: QueuedEvent[] = [];
  // 轻量去重：记录仍在队列中的 dedupKey
  private readonly dedupSet = new Set<string>();

  /**
   * 入箱单条事件；同一 dedupKey 仍在队列中时跳过
   */
  async enqueue(input: { readonly envelope: IntegrationEventEnvelope }): Promise<void> {
    await Promise.resolve();
    const key = input.envelope.dedupKey;
    if (key && this.dedupSet.has(key)) return;
    if (key) this.dedupSet.add(key);
    const deliverAfterMs = input.envelope.deliverAfter
      ? Date.parse(input.envelope.deliverAfter)
      : Date.now();
    this.queue.push({ envelope: input.envelope, attempts: 0, nextAttemptAt: deliverAfterMs });
  }

  /**
   * 拉取就绪批次（不移除），优先级高者先出，其次按计划时间
   * @param maxCount 最大批量数
   */
  pullReady(maxCount: number): ReadonlyArray<OutboxReadyItem> {
    const now = Date.now();
    return this.queue
      .filter((e) => e.nextAttemptAt <= now)
      .sort(
        (a, b) =>
          (b.envelope.priority ?? 0) - (a.envelope.priority ?? 0) ||
          a.nextAttemptAt - b.nextAttemptAt,
      )
      .slice(0, maxCount)
      .map((e) => ({ envelope: e.envelope, attempts: e.attempts }));
  }

  /**
   * 标记成功并移除
   */
  markSucceeded(env: IntegrationEventEnvelope): void {
    this.remove(env);
  }

  /**
   * 计划重试；达到最大次数时移入失败集合
   * @param backoffMs 退避毫秒
   * @param maxAttempts 最大尝试次数
   */
  scheduleRetry(env: IntegrationEventEnvelope, backoffMs: number, maxAttempts: number): void {
    const item = this.queue.find((q) => q.envelope === env);
    if (!item) return;
    item.attempts += 1;
    if (item.attempts >= maxAttempts) {
      this.failed.push(item);
      this.remove(env);
      return;
    }
    item.nextAttemptAt = Date.now() + backoffMs;
  }

  /**
   * 队列指标快照
   */
  snapshot(): OutboxSnapshot {
    return { queued: this.queue.length, failed: this.failed.length };
  }

  private remove(env: IntegrationEventEnvelope): void {
    const idx = this.queue.findIndex((q) => q.envelope === env);
    if (idx >= 0) this.queue.splice(idx, 1);
    if (env.dedupKey) this.dedupSet.delete(env.dedupKey);
  }
}
