// src/modules/common/integration-events/handlers/cleanup-abandoned-enrollments.handler.ts
import { EnrollmentService } from '@modules/enrollment/enrollment.service';
import { Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';
import type { IntegrationEventHandler } from '../outbox.dispatcher';

/**
 * 清理悬空选课（课程或学生已不存在）
 * 删除是幂等的，重复投递只会得到 0 行
 */
@Injectable()
export class CleanupAbandonedEnrollmentsHandler implements IntegrationEventHandler {
  readonly type = 'EnrollmentCleanupRequested' as const;

  constructor(
    private readonly enrollmentService: EnrollmentService,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(CleanupAbandonedEnrollmentsHandler.name);
  }

  async handle(): Promise<void> {
    await this.execute();
  }

  async execute(): Promise<number> {
    const removed = await this.enrollmentService.deleteAbandoned();
    this.logger.info({ removed }, 'Abandoned enrollments cleanup finished');
    return removed;
  }
}
