// src/usecases/enrollment/cancel-enrollment.usecase.ts
import type { Actor } from '@app-types/auth/session.types';
import { DomainError, ENROLLMENT_ERROR } from '@core/common/errors/domain-error';
import { assertAuthorized, requireUser } from '@core/course/policy/course-access.policy';
import { EnrollmentService } from '@modules/enrollment/enrollment.service';
import { Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';

/**
 * 退课用例：本人或管理员可删除
 */
@Injectable()
export class CancelEnrollmentUsecase {
  constructor(
    private readonly enrollmentService: EnrollmentService,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(CancelEnrollmentUsecase.name);
  }

  async execute(actor: Actor, enrollmentId: number): Promise<void> {
    const user = requireUser(actor);
    const enrollment = await this.enrollmentService.findById(enrollmentId);
    if (!enrollment) {
      throw new DomainError(ENROLLMENT_ERROR.ENROLLMENT_NOT_FOUND, 'Enrollment not found.', {
        enrollmentId,
      });
    }
    assertAuthorized(user, 'delete', { kind: 'enrollment', studentId: enrollment.studentId });

    await this.enrollmentService.delete(enrollmentId);
    this.logger.info(
      { enrollmentId, studentId: enrollment.studentId, actorId: user.id },
      'Enrollment cancelled',
    );
  }
}
