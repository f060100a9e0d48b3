// src/usecases/enrollment/enroll-student.usecase.ts
import type { Actor } from '@app-types/auth/session.types';
import type { EnrollmentView } from '@app-types/models/course.types';
import { COURSE_ERROR, DomainError, ENROLLMENT_ERROR } from '@core/common/errors/domain-error';
import { buildEnrollmentCreated } from '@core/common/integration-events/events.types';
import type { IOutboxWriterPort } from '@core/common/integration-events/outbox.port';
import { assertAuthorized, requireUser } from '@core/course/policy/course-access.policy';
import { INTEGRATION_EVENTS_TOKENS } from '@modules/common/integration-events/events.tokens';
import { CourseService } from '@modules/course/courses/course.service';
import { EnrollmentEntity } from '@modules/enrollment/enrollment.entity';
import { EnrollmentService } from '@modules/enrollment/enrollment.service';
import { Inject, Injectable } from '@nestjs/common';
import { isUniqueViolation } from '@src/infrastructure/typeorm/unique-violation';
import { PinoLogger } from 'nestjs-pino';
import { toEnrollmentView } from './enrollment-view.mapper';

export type EnrollStudentInput = {
  readonly courseId: number;
  /** 请求关联 ID，写入事件信封便于追踪 */
  readonly correlationId?: string;
};

export const DUPLICATE_ENROLLMENT_MESSAGE = 'You are already enrolled in this course.';

const duplicateEnrollment = (studentId: number, courseId: number, cause?: unknown) =>
  new DomainError(
    ENROLLMENT_ERROR.DUPLICATE_ENROLLMENT,
    DUPLICATE_ENROLLMENT_MESSAGE,
    { studentId, courseId },
    cause,
  );

/**
 * 选课用例
 * 1. 仅学生可选课（匿名 401，其他角色 403）
 * 2. 课程必须存在
 * 3. 预查重只是优化，最终由 (student_id, course_id) 唯一约束兜底
 * 4. 入箱 EnrollmentCreated；入箱失败只记录日志，不影响选课结果
 */
@Injectable()
export class EnrollStudentUsecase {
  constructor(
    private readonly courseService: CourseService,
    private readonly enrollmentService: EnrollmentService,
    @Inject(INTEGRATION_EVENTS_TOKENS.OUTBOX_WRITER_PORT)
    private readonly outboxWriter: IOutboxWriterPort,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(EnrollStudentUsecase.name);
  }

  async execute(actor: Actor, input: EnrollStudentInput): Promise<EnrollmentView> {
    const student = requireUser(actor);
    assertAuthorized(student, 'create', { kind: 'enrollment-collection' });

    const course = await this.courseService.findById(input.courseId);
    if (!course) {
      throw new DomainError(COURSE_ERROR.COURSE_NOT_FOUND, 'Course not found.', {
        courseId: input.courseId,
      });
    }

    const existing = await this.enrollmentService.findByUnique({
      studentId: student.id,
      courseId: course.id,
    });
    if (existing) throw duplicateEnrollment(student.id, course.id);

    const enrollment = await this.insert(student.id, course.id);
    await this.enqueueNotification(enrollment, input.correlationId);
    return toEnrollmentView(enrollment);
  }

  private async insert(studentId: number, courseId: number): Promise<EnrollmentEntity> {
    try {
      return await this.enrollmentService.create({ studentId, courseId });
    } catch (error) {
      if (isUniqueViolation(error)) throw duplicateEnrollment(studentId, courseId, error);
      throw error;
    }
  }

  private async enqueueNotification(
    enrollment: EnrollmentEntity,
    correlationId: string | undefined,
  ): Promise<void> {
    try {
      await this.outboxWriter.enqueue({
        envelope: buildEnrollmentCreated({ enrollmentId: enrollment.id, correlationId }),
      });
    } catch (error) {
      this.logger.error(
        { err: error, enrollmentId: enrollment.id },
        'Failed to enqueue enrollment notification',
      );
    }
  }
}
