// src/modules/common/integration-events/handlers/send-enrollment-email.handler.ts
import {
  readEnrollmentCreatedPayload,
  type IntegrationEventEnvelope,
} from '@core/common/integration-events/events.types';
import type { KeyValueStorePort } from '@core/common/kv/key-value-store.port';
import type { EnrollmentNotifierPort } from '@core/enrollment/enrollment-notifier.port';
import { CACHE_TOKENS } from '@modules/common/cache/cache.tokens';
import { EnrollmentService } from '@modules/enrollment/enrollment.service';
import { Inject, Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';
import { INTEGRATION_EVENTS_TOKENS } from '../events.tokens';
import type { IntegrationEventHandler } from '../outbox.dispatcher';

/** 幂等键有效期：1 小时 */
export const SEND_EMAIL_DEDUP_TTL_SECONDS = 3600;

export const sendEmailTaskKey = (enrollmentId: number): string =>
  `task:send_email:${enrollmentId}`;

export type SendEnrollmentEmailOutcome = 'sent' | 'duplicate' | 'missing' | 'invalid';

/**
 * 选课通知任务
 * - 先在共享 KV 中原子占位 task:send_email:{id}，占位失败说明已处理过，直接跳过
 * - 选课记录已被删除时记录 warn 并正常结束（不重试）
 */
@Injectable()
export class SendEnrollmentEmailHandler implements IntegrationEventHandler {
  readonly type = 'EnrollmentCreated' as const;

  constructor(
    @Inject(CACHE_TOKENS.KV_STORE)
    private readonly store: KeyValueStorePort,
    private readonly enrollmentService: EnrollmentService,
    @Inject(INTEGRATION_EVENTS_TOKENS.ENROLLMENT_NOTIFIER)
    private readonly notifier: EnrollmentNotifierPort,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(SendEnrollmentEmailHandler.name);
  }

  async handle(input: { readonly envelope: IntegrationEventEnvelope }): Promise<void> {
    const payload = readEnrollmentCreatedPayload(input.envelope);
    if (!payload) {
      this.logger.warn({ dedupKey: input.envelope.dedupKey }, 'EnrollmentCreated payload invalid');
      return;
    }
    await this.execute(payload.enrollmentId);
  }

  /**
   * 执行一次通知任务（可被重复投递）
   * @param enrollmentId 选课 ID
   */
  async execute(enrollmentId: number): Promise<SendEnrollmentEmailOutcome> {
    if (!Number.isInteger(enrollmentId) || enrollmentId <= 0) return 'invalid';

    const key = sendEmailTaskKey(enrollmentId);
    const acquired = await this.store.setIfAbsent(key, '1', SEND_EMAIL_DEDUP_TTL_SECONDS);
    if (!acquired) {
      this.logger.info({ enrollmentId }, 'Enrollment email skipped, already processed');
      return 'duplicate';
    }

    const enrollment = await this.enrollmentService.findById(enrollmentId);
    if (!enrollment) {
      this.logger.warn({ enrollmentId }, 'Enrollment not found, email not sent');
      return 'missing';
    }

    await this.notifier.notifyEnrolled({
      enrollmentId: enrollment.id,
      studentId: enrollment.studentId,
      courseId: enrollment.courseId,
    });
    return 'sent';
  }
}
