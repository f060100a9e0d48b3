/* eslint-disable max-lines-per-function */
// src/modules/common/integration-events/maintenance.scheduler.spec.ts
import type { IntegrationEventEnvelope } from '@core/common/integration-events/events.types';
import { ConfigService } from '@nestjs/config';
import { asPinoLogger, createLoggerMock, type LoggerMock } from '@src/utils/test/logger-mock';
import { MaintenanceScheduler } from './maintenance.scheduler';
import { OutboxMemoryService } from './outbox.memory.service';

type EnqueueInput = { readonly envelope: IntegrationEventEnvelope };

const config = (values: Record<string, string>): ConfigService => new ConfigService(values);

describe('MaintenanceScheduler', () => {
  let outbox: OutboxMemoryService;
  let logger: LoggerMock;

  beforeEach(() => {
    outbox = new OutboxMemoryService();
    logger = createLoggerMock();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('未配置周期时使用默认值：日报每天、清理每小时', () => {
    const scheduler = new MaintenanceScheduler(config({}), outbox, asPinoLogger(logger));
    expect(scheduler.jobs).toEqual([
      { type: 'DailyReportRequested', intervalMs: 86_400_000 },
      { type: 'EnrollmentCleanupRequested', intervalMs: 3_600_000 },
    ]);
  });

  it('按周期编号入箱，同一周期重复触发只保留一条', async () => {
    const scheduler = new MaintenanceScheduler(
      config({ INTEV_DAILY_REPORT_INTERVAL_MS: '1000' }),
      outbox,
      asPinoLogger(logger),
    );

    await expect(scheduler.trigger('DailyReportRequested', new Date(5_500))).resolves.toBe(true);
    await scheduler.trigger('DailyReportRequested', new Date(5_900));
    expect(outbox.snapshot()).toEqual({ queued: 1, failed: 0 });

    const [item] = outbox.pullReady(10);
    expect(item.envelope).toMatchObject({
      type: 'DailyReportRequested',
      aggregateType: 'maintenance',
      aggregateId: 5,
      payload: { period: 5 },
      dedupKey: 'DailyReportRequested:5',
    });

    await scheduler.trigger('DailyReportRequested', new Date(6_000));
    expect(outbox.snapshot()).toEqual({ queued: 2, failed: 0 });
  });

  it('入箱失败记录错误并返回 false', async () => {
    const failure = new Error('outbox unavailable');
    const enqueue = jest.fn<Promise<void>, [EnqueueInput]>(() => Promise.reject(failure));
    const scheduler = new MaintenanceScheduler(
      config({ INTEV_CLEANUP_INTERVAL_MS: '1000' }),
      { enqueue },
      asPinoLogger(logger),
    );

    await expect(scheduler.trigger('EnrollmentCleanupRequested', new Date(3_000))).resolves.toBe(
      false,
    );
    expect(logger.error).toHaveBeenCalledWith(
      { err: failure, type: 'EnrollmentCleanupRequested', period: 3 },
      'Maintenance task enqueue failed',
    );
  });

  it('启用时按间隔触发，销毁后停止', async () => {
    jest.useFakeTimers();
    // ConfigService 优先读取进程环境变量，测试环境默认关闭调度
    process.env.INTEV_ENABLED = 'true';
    const enqueue = jest.fn<Promise<void>, [EnqueueInput]>(() => Promise.resolve());
    const scheduler = new MaintenanceScheduler(
      config({ INTEV_DAILY_REPORT_INTERVAL_MS: '1000', INTEV_CLEANUP_INTERVAL_MS: '400' }),
      { enqueue },
      asPinoLogger(logger),
    );
    process.env.INTEV_ENABLED = 'false';

    await scheduler.onModuleInit();
    jest.advanceTimersByTime(1_000);
    const types = enqueue.mock.calls.map(([input]) => input.envelope.type);
    expect(types.filter((t) => t === 'EnrollmentCleanupRequested')).toHaveLength(2);
    expect(types.filter((t) => t === 'DailyReportRequested')).toHaveLength(1);

    await scheduler.onModuleDestroy();
    jest.advanceTimersByTime(5_000);
    expect(enqueue).toHaveBeenCalledTimes(3);
  });

  it('INTEV_ENABLED=false 时不启动定时器', async () => {
    jest.useFakeTimers();
    const enqueue = jest.fn<Promise<void>, [EnqueueInput]>(() => Promise.resolve());
    const scheduler = new MaintenanceScheduler(
      config({ INTEV_CLEANUP_INTERVAL_MS: '10' }),
      { enqueue },
      asPinoLogger(logger),
    );

    await scheduler.onModuleInit();
    jest.advanceTimersByTime(1_000);
    expect(enqueue).not.toHaveBeenCalled();
  });
});
