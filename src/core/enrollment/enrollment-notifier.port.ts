// src/core/enrollment/enrollment-notifier.port.ts

/**
 * 选课通知端口（邮件 / 站内信等具体实现由外层提供）
 */
export interface EnrollmentNotifierPort {
  notifyEnrolled(input: {
    readonly enrollmentId: number;
    readonly studentId: number;
    readonly courseId: number;
  }): Promise<void>;
}
