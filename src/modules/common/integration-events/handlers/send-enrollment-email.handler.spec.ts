/* eslint-disable max-lines-per-function */
// src/modules/common/integration-events/handlers/send-enrollment-email.handler.spec.ts
import { buildEnrollmentCreated, buildEnvelope } from '@core/common/integration-events/events.types';
import { EnrollmentEntity } from '@modules/enrollment/enrollment.entity';
import type { EnrollmentService } from '@modules/enrollment/enrollment.service';
import { MemoryKeyValueStore } from '@src/infrastructure/kv/memory-key-value-store';
import { asPinoLogger, createLoggerMock, type LoggerMock } from '@src/utils/test/logger-mock';
import {
  SEND_EMAIL_DEDUP_TTL_SECONDS,
  SendEnrollmentEmailHandler,
  sendEmailTaskKey,
} from './send-enrollment-email.handler';

const enrollment = (id: number): EnrollmentEntity =>
  Object.assign(new EnrollmentEntity(), {
    id,
    studentId: 3,
    courseId: 9,
    createdAt: new Date('2026-01-01T00:00:00.000Z'),
  });

describe('SendEnrollmentEmailHandler', () => {
  let store: MemoryKeyValueStore;
  let findById: jest.Mock<Promise<EnrollmentEntity | null>, [number]>;
  let notifyEnrolled: jest.Mock<Promise<void>, [unknown]>;
  let logger: LoggerMock;
  let handler: SendEnrollmentEmailHandler;

  beforeEach(() => {
    store = new MemoryKeyValueStore();
    findById = jest.fn<Promise<EnrollmentEntity | null>, [number]>((id) =>
      Promise.resolve(id === 5 ? enrollment(5) : null),
    );
    notifyEnrolled = jest.fn<Promise<void>, [unknown]>(() => Promise.resolve());
    logger = createLoggerMock();
    handler = new SendEnrollmentEmailHandler(
      store,
      { findById } as unknown as EnrollmentService,
      { notifyEnrolled },
      asPinoLogger(logger),
    );
  });

  it('task key 形如 task:send_email:{id}', () => {
    expect(sendEmailTaskKey(42)).toBe('task:send_email:42');
  });

  it('首次执行发送通知并占位', async () => {
    await expect(handler.execute(5)).resolves.toBe('sent');
    expect(notifyEnrolled).toHaveBeenCalledWith({ enrollmentId: 5, studentId: 3, courseId: 9 });
    await expect(store.get('task:send_email:5')).resolves.toBe('1');
  });

  it('同一选课重复执行只发送一次', async () => {
    await handler.execute(5);
    await expect(handler.execute(5)).resolves.toBe('duplicate');
    expect(notifyEnrolled).toHaveBeenCalledTimes(1);
    expect(logger.info).toHaveBeenCalledWith(
      { enrollmentId: 5 },
      'Enrollment email skipped, already processed',
    );
  });

  it('并发执行时只有一个占位成功', async () => {
    const outcomes = await Promise.all([handler.execute(5), handler.execute(5)]);
    expect([...outcomes].sort()).toEqual(['duplicate', 'sent']);
    expect(notifyEnrolled).toHaveBeenCalledTimes(1);
  });

  it('选课已删除时记录 warn 且不发送', async () => {
    await expect(handler.execute(77)).resolves.toBe('missing');
    expect(notifyEnrolled).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledWith(
      { enrollmentId: 77 },
      'Enrollment not found, email not sent',
    );
  });

  it('非法 ID 直接返回 invalid，不占位', async () => {
    await expect(handler.execute(0)).resolves.toBe('invalid');
    expect(findById).not.toHaveBeenCalled();
    await expect(store.get(sendEmailTaskKey(0))).resolves.toBeNull();
  });

  it('占位的有效期为 1 小时', async () => {
    const spy = jest.spyOn(store, 'setIfAbsent');
    await handler.execute(5);
    expect(spy).toHaveBeenCalledWith('task:send_email:5', '1', SEND_EMAIL_DEDUP_TTL_SECONDS);
    expect(SEND_EMAIL_DEDUP_TTL_SECONDS).toBe(3600);
  });

  it('handle 从信封载荷中读取 enrollmentId', async () => {
    await handler.handle({ envelope: buildEnrollmentCreated({ enrollmentId: 5 }) });
    expect(notifyEnrolled).toHaveBeenCalledTimes(1);
  });

  it('载荷不合法时只记录 warn', async () => {
    const envelope = buildEnvelope({
      type: 'EnrollmentCreated',
      aggregateType: 'enrollment',
      aggregateId: 'x',
      payload: { enrollmentId: 'x' },
    });
    await handler.handle({ envelope });
    expect(findById).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledWith(
      { dedupKey: 'EnrollmentCreated:x:1' },
      'EnrollmentCreated payload invalid',
    );
  });

  it('通知失败时抛出，交给调度器重试', async () => {
    notifyEnrolled.mockRejectedValueOnce(new Error('smtp down'));
    await expect(handler.execute(5)).rejects.toThrow('smtp down');
  });
});
