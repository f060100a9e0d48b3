// src/modules/common/integration-events/outbox.dispatcher.ts
import type { IntegrationEventEnvelope } from '@core/common/integration-events/events.types';
import type {
  DispatchReport,
  IOutboxDispatcherPort,
  IOutboxStorePort,
} from '@core/common/integration-events/outbox.port';
import { Inject, Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PinoLogger } from 'nestjs-pino';
import { INTEGRATION_EVENTS_TOKENS } from './events.tokens';

/**
 * 事件处理器接口
 */
export interface IntegrationEventHandler {
  readonly type: IntegrationEventEnvelope['type'];
  handle(input: { readonly envelope: IntegrationEventEnvelope }): Promise<void>;
}

const DEFAULT_BACKOFF_SERIES: ReadonlyArray<number> = [1000, 5000, 30000, 120000, 600000];

/**
 * 内存 Outbox 调度器：定期拉取就绪事件并分发给处理器（至少一次投递）
 */
@Injectable()
export class OutboxDispatcher implements OnModuleInit, OnModuleDestroy, IOutboxDispatcherPort {
  private timer: NodeJS.Timeout | null = null;
  private readonly maxAttempts: number;
  private readonly backoffSeries: ReadonlyArray<number>;
  private readonly batchSize: number;
  private readonly enabled: boolean;
  private readonly intervalMs: number;
  private isTicking = false;
  private running = false;

  constructor(
    private readonly config: ConfigService,
    @Inject(INTEGRATION_EVENTS_TOKENS.OUTBOX_STORE_PORT)
    private readonly store: IOutboxStorePort,
    @Inject(INTEGRATION_EVENTS_TOKENS.HANDLERS)
    private readonly handlers: ReadonlyArray<IntegrationEventHandler>,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(OutboxDispatcher.name);

    // 显式归一配置类型，避免隐式类型转换带来的行为偏差
    const toNum = (v: unknown, d: number): number => {
      if (v == null || v === '') return d;
      const n = Number(v);
      return Number.isFinite(n) ? n : d;
    };

    const rawEnabled = this.config.get<string>('INTEV_ENABLED', 'true');
    const seriesRaw = this.config.get<string>('INTEV_BACKOFF_SERIES');

    this.enabled = String(rawEnabled).toLowerCase() !== 'false';
    this.batchSize = toNum(this.config.get<string>('INTEV_BATCH_SIZE'), 100);
    this.maxAttempts = toNum(this.config.get<string>('INTEV_MAX_ATTEMPTS'), 5);
    this.intervalMs = toNum(this.config.get<string>('INTEV_DISPATCH_INTERVAL_MS'), 1000);

    // 逗号分隔的毫秒列表，例如 "1000,5000,30000"
    const parsedSeries = seriesRaw
      ? seriesRaw
          .split(',')
          .map((v) => toNum(v.trim(), -1))
          .filter((n) => n >= 0)
      : [];
    this.backoffSeries = parsedSeries.length > 0 ? parsedSeries : DEFAULT_BACKOFF_SERIES;
  }

  /**
   * 模块初始化：按配置启动调度器
   */
  async onModuleInit(): Promise<void> {
    if (!this.enabled) return;
    this.running = true;
    this.scheduleNextTick();
    await Promise.resolve();
  }

  /**
   * 模块销毁：停止调度器
   */
  async onModuleDestroy(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await Promise.resolve();
  }

  /**
   * 手动启动调度器（幂等）
   */
  async start(): Promise<void> {
    if (this.running) return;
    await this.onModuleInit();
  }

  /**
   * 手动停止调度器（幂等）
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    await this.onModuleDestroy();
  }

  /**
   * 处理一个调度周期
   * - 同一事件类型的多个处理器按顺序执行
   * - 任一处理器失败则整条事件按退避重试（处理器需幂等）
   */
  async dispatchOnce(): Promise<DispatchReport> {
    if (this.isTicking) return { succeeded: 0, retried: 0 };
    this.isTicking = true;
    let succeeded = 0;
    let retried = 0;
    try {
      const ready = this.store.pullReady(this.batchSize);
      for (const item of ready) {
        const matchedHandlers = this.handlers.filter((h) => h.type === item.envelope.type);
        const failure = await this.runHandlers(item.envelope, matchedHandlers);
        if (failure === null) {
          this.store.markSucceeded(item.envelope);
          succeeded += 1;
          continue;
        }
        const attemptIdx = Math.min(item.attempts, this.backoffSeries.length - 1);
        const backoffMs = this.backoffSeries[attemptIdx];
        this.logger.warn(
          {
            err: failure,
            type: item.envelope.type,
            dedupKey: item.envelope.dedupKey,
            attempts: item.attempts + 1,
            backoffMs,
          },
          'Integration event handler failed, scheduling retry',
        );
        this.store.scheduleRetry(item.envelope, backoffMs, this.maxAttempts);
        retried += 1;
      }
    } finally {
      this.isTicking = false;
    }
    return { succeeded, retried };
  }

  /**
   * 顺序执行处理器，返回首个失败原因（全部成功时返回 null）
   */
  private async runHandlers(
    envelope: IntegrationEventEnvelope,
    handlers: ReadonlyArray<IntegrationEventHandler>,
  ): Promise<unknown> {
    for (const handler of handlers) {
      try {
        await handler.handle({ envelope });
      } catch (error) {
        return error ?? new Error('Handler rejected without reason');
      }
    }
    return null;
  }

  /**
   * 定时周期：执行一次调度后再安排下一次（自调度避免重入）
   */
  private async tick(): Promise<void> {
    try {
      await this.dispatchOnce();
    } catch (error) {
      this.logger.error({ err: error }, 'Outbox dispatch cycle failed');
    } finally {
      if (this.running) this.scheduleNextTick();
    }
  }

  private scheduleNextTick(): void {
    if (!this.enabled || !this.running) return;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.timer = setTimeout(() => {
      void this.tick();
    }, this.intervalMs);
  }
}
