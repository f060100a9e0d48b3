// src/modules/common/integration-events/notifiers/logging-enrollment.notifier.ts
import type { EnrollmentNotifierPort } from '@core/enrollment/enrollment-notifier.port';
import { Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';

/**
 * 默认通知实现：仅写日志（接入邮件服务前的占位）
 */
@Injectable()
export class LoggingEnrollmentNotifier implements EnrollmentNotifierPort {
  constructor(private readonly logger: PinoLogger) {
    this.logger.setContext(LoggingEnrollmentNotifier.name);
  }

  async notifyEnrolled(input: {
    readonly enrollmentId: number;
    readonly studentId: number;
    readonly courseId: number;
  }): Promise<void> {
    await Promise.resolve();
    this.logger.info(
      { enrollmentId: input.enrollmentId, studentId: input.studentId, courseId: input.courseId },
      `Sending enrollment email: student=${input.studentId}, course=${input.courseId}`,
    );
  }
}
