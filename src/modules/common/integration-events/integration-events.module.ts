// src/modules/common/integration-events/integration-events.module.ts
import { AppCacheModule } from '@modules/common/cache/cache.module';
import { CourseServiceModule } from '@modules/course/courses/course-service.module';
import { EnrollmentServiceModule } from '@modules/enrollment/enrollment-service.module';
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { INTEGRATION_EVENTS_TOKENS } from './events.tokens';
import { CleanupAbandonedEnrollmentsHandler } from './handlers/cleanup-abandoned-enrollments.handler';
import { GenerateDailyReportHandler } from './handlers/generate-daily-report.handler';
import { SendEnrollmentEmailHandler } from './handlers/send-enrollment-email.handler';
import { MaintenanceScheduler } from './maintenance.scheduler';
import { LoggingEnrollmentNotifier } from './notifiers/logging-enrollment.notifier';
import { OutboxDispatcher } from './outbox.dispatcher';
import { OutboxMemoryService } from './outbox.memory.service';

/**
 * Integration Events 模块：提供 Outbox 端口、调度器、定时维护任务与后台任务处理器
 */
@Module({
  imports: [ConfigModule, AppCacheModule, CourseServiceModule, EnrollmentServiceModule],
  providers: [
    // 端口实现：内存 Outbox Writer
    { provide: INTEGRATION_EVENTS_TOKENS.OUTBOX_WRITER_PORT, useClass: OutboxMemoryService },
    // 端口实现：内存 Outbox Store（与 Writer 复用同一实现实例）
    {
      provide: INTEGRATION_EVENTS_TOKENS.OUTBOX_STORE_PORT,
      useExisting: INTEGRATION_EVENTS_TOKENS.OUTBOX_WRITER_PORT,
    },
    { provide: INTEGRATION_EVENTS_TOKENS.ENROLLMENT_NOTIFIER, useClass: LoggingEnrollmentNotifier },
    // 事件处理器集合
    SendEnrollmentEmailHandler,
    GenerateDailyReportHandler,
    CleanupAbandonedEnrollmentsHandler,
    {
      provide: INTEGRATION_EVENTS_TOKENS.HANDLERS,
      useFactory: (
        h1: SendEnrollmentEmailHandler,
        h2: GenerateDailyReportHandler,
        h3: CleanupAbandonedEnrollmentsHandler,
      ) => [h1, h2, h3],
      inject: [
        SendEnrollmentEmailHandler,
        GenerateDailyReportHandler,
        CleanupAbandonedEnrollmentsHandler,
      ],
    },
    // 调度器实现端口
    { provide: INTEGRATION_EVENTS_TOKENS.OUTBOX_DISPATCHER_PORT, useClass: OutboxDispatcher },
    // 定时维护任务：每日统计与悬空选课清理
    MaintenanceScheduler,
  ],
  exports: [
    INTEGRATION_EVENTS_TOKENS.OUTBOX_WRITER_PORT,
    INTEGRATION_EVENTS_TOKENS.OUTBOX_STORE_PORT,
    INTEGRATION_EVENTS_TOKENS.OUTBOX_DISPATCHER_PORT,
    INTEGRATION_EVENTS_TOKENS.ENROLLMENT_NOTIFIER,
    SendEnrollmentEmailHandler,
    MaintenanceScheduler,
  ],
})
export class IntegrationEventsModule {}
