// src/modules/common/integration-events/maintenance.scheduler.ts
import {
  buildMaintenanceTask,
  type MaintenanceTaskType,
} from '@core/common/integration-events/events.types';
import type { IOutboxWriterPort } from '@core/common/integration-events/outbox.port';
import { Inject, Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PinoLogger } from 'nestjs-pino';
import { INTEGRATION_EVENTS_TOKENS } from './events.tokens';

const DAY_MS = 24 * 60 * 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;

export type MaintenanceJob = {
  readonly type: MaintenanceTaskType;
  readonly intervalMs: number;
};

/**
 * 定时维护任务调度器
 * 只负责按周期把任务入箱，执行交给 OutboxDispatcher 与对应处理器
 * 启停跟随 INTEV_ENABLED；周期由 INTEV_DAILY_REPORT_INTERVAL_MS / INTEV_CLEANUP_INTERVAL_MS 配置
 */
@Injectable()
export class MaintenanceScheduler implements OnModuleInit, OnModuleDestroy {
  readonly jobs: ReadonlyArray<MaintenanceJob>;
  private readonly enabled: boolean;
  private readonly timers: NodeJS.Timeout[] = [];

  constructor(
    private readonly config: ConfigService,
    @Inject(INTEGRATION_EVENTS_TOKENS.OUTBOX_WRITER_PORT)
    private readonly outbox: IOutboxWriterPort,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(MaintenanceScheduler.name);

    const toInterval = (key: string, d: number): number => {
      const n = Number(this.config.get<string>(key) ?? '');
      return Number.isFinite(n) && n > 0 ? n : d;
    };

    this.enabled =
      String(this.config.get<string>('INTEV_ENABLED', 'true')).toLowerCase() !== 'false';
    this.jobs = [
      {
        type: 'DailyReportRequested',
        intervalMs: toInterval('INTEV_DAILY_REPORT_INTERVAL_MS', DAY_MS),
      },
      {
        type: 'EnrollmentCleanupRequested',
        intervalMs: toInterval('INTEV_CLEANUP_INTERVAL_MS', HOUR_MS),
      },
    ];
  }

  async onModuleInit(): Promise<void> {
    if (!this.enabled) return;
    for (const job of this.jobs) {
      const timer = setInterval(() => {
        void this.enqueue(job);
      }, job.intervalMs);
      timer.unref();
      this.timers.push(timer);
    }
    await Promise.resolve();
  }

  async onModuleDestroy(): Promise<void> {
    for (const timer of this.timers.splice(0)) clearInterval(timer);
    await Promise.resolve();
  }

  /**
   * 为任务入箱一次；周期编号 = floor(now / intervalMs)
   * 入箱失败只记录日志，下个周期会再次触发
   * @returns 是否成功入箱（同周期重复时 Outbox 自行去重）
   */
  async enqueue(job: MaintenanceJob, now: Date = new Date()): Promise<boolean> {
    const period = Math.floor(now.getTime() / job.intervalMs);
    try {
      await this.outbox.enqueue({
        envelope: buildMaintenanceTask({ type: job.type, period, occurredAt: now }),
      });
      return true;
    } catch (error) {
      this.logger.error({ err: error, type: job.type, period }, 'Maintenance task enqueue failed');
      return false;
    }
  }

  /**
   * 按类型立即入箱（运维与测试入口）
   */
  async trigger(type: MaintenanceTaskType, now?: Date): Promise<boolean> {
    const job = this.jobs.find((j) => j.type === type);
    if (!job) return false;
    return await this.enqueue(job, now);
  }
}
