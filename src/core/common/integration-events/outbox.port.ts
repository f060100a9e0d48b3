// src/core/common/integration-events/outbox.port.ts
import type { IntegrationEventEnvelope } from './events.types';

/**
 * Outbox 写入端口（纯抽象，无 I/O）
 * 业务侧只负责入箱，不关心投递时机
 */
export interface IOutboxWriterPort {
  enqueue(input: { readonly envelope: IntegrationEventEnvelope }): Promise<void>;
}

export interface IOutboxDispatcherPort {
  start(): Promise<void>;
  stop(): Promise<void>;
  /**
   * 立即执行一个调度周期（不依赖定时器）
   */
  dispatchOnce(): Promise<DispatchReport>;
}

/**
 * Outbox Store 端口（供 Dispatcher 使用）
 * - 负责提供就绪事件拉取与状态更新能力
 * - 不关心具体存储实现（内存 / DB / MQ）
 */
export interface IOutboxStorePort {
  /**
   * 拉取就绪事件批次（不移除）
   * @param maxCount 最大批量数
   */
  pullReady(maxCount: number): ReadonlyArray<OutboxReadyItem>;

  /**
   * 标记事件成功并移除出队列/存储
   */
  markSucceeded(env: IntegrationEventEnvelope): void;

  /**
   * 计划重试或标记失败
   * @param backoffMs 退避毫秒数
   * @param maxAttempts 最大尝试次数
   */
  scheduleRetry(env: IntegrationEventEnvelope, backoffMs: number, maxAttempts: number): void;

  snapshot(): OutboxSnapshot;
}

/**
 * 就绪事件项
 */
export interface OutboxReadyItem {
  readonly envelope: IntegrationEventEnvelope;
  readonly attempts: number;
}

/**
 * 队列快照指标
 */
export interface OutboxSnapshot {
  readonly queued: number;
  readonly failed: number;
}

/**
 * 单个调度周期的处理结果
 */
export interface DispatchReport {
  readonly succeeded: number;
  readonly retried: number;
}
