// src/modules/common/integration-events/handlers/generate-daily-report.handler.ts
import type { IntegrationEventEnvelope } from '@core/common/integration-events/events.types';
import { CourseService } from '@modules/course/courses/course.service';
import { EnrollmentService } from '@modules/enrollment/enrollment.service';
import { Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';
import type { IntegrationEventHandler } from '../outbox.dispatcher';

export type DailyReport = {
  readonly totalCourses: number;
  readonly totalEnrollments: number;
};

/**
 * 每日统计：课程总数与选课总数，只写日志
 */
@Injectable()
export class GenerateDailyReportHandler implements IntegrationEventHandler {
  readonly type = 'DailyReportRequested' as const;

  constructor(
    private readonly courseService: CourseService,
    private readonly enrollmentService: EnrollmentService,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(GenerateDailyReportHandler.name);
  }

  async handle(input: { readonly envelope: IntegrationEventEnvelope }): Promise<void> {
    await this.execute(input.envelope.aggregateId);
  }

  async execute(period?: number | string): Promise<DailyReport> {
    const [totalCourses, totalEnrollments] = await Promise.all([
      this.courseService.count(),
      this.enrollmentService.count(),
    ]);
    this.logger.info({ period, totalCourses, totalEnrollments }, 'Daily report');
    return { totalCourses, totalEnrollments };
  }
}
