/* eslint-disable max-lines-per-function */
// src/core/common/integration-events/events.types.spec.ts
import {
  buildEnrollmentCreated,
  buildEnvelope,
  readEnrollmentCreatedPayload,
} from './events.types';

/**
 * 构造标准事件信封的单元测试
 */
describe('buildEnvelope', () => {
  it('默认填充 schemaVersion=1、occurredAt、dedupKey', () => {
    const env = buildEnvelope({
      type: 'EnrollmentCreated',
      aggregateType: 'enrollment',
      aggregateId: 123,
    });
    expect(env.schemaVersion).toBe(1);
    expect(env.payload).toEqual({});
    expect(typeof env.occurredAt).toBe('string');
    expect(String(env.dedupKey)).toBe('EnrollmentCreated:123:1');
  });

  it('支持覆盖 schemaVersion、dedupKey 与 deliverAfter', () => {
    const deliverAfter = new Date('2030-01-01T00:00:00.000Z');
    const env = buildEnvelope({
      type: 'EnrollmentCreated',
      aggregateType: 'enrollment',
      aggregateId: 7,
      schemaVersion: 2,
      dedupKey: 'custom-key',
      deliverAfter,
      priority: 5,
    });
    expect(String(env.dedupKey)).toBe('custom-key');
    expect(String(env.deliverAfter)).toBe('2030-01-01T00:00:00.000Z');
    expect(env.priority).toBe(5);
  });
});

describe('EnrollmentCreated', () => {
  it('载荷只携带 enrollmentId，dedupKey 按选课 ID 生成', () => {
    const env = buildEnrollmentCreated({ enrollmentId: 42, correlationId: 'req-1' });
    expect(env.type).toBe('EnrollmentCreated');
    expect(env.aggregateId).toBe(42);
    expect(env.payload).toEqual({ enrollmentId: 42 });
    expect(env.correlationId).toBe('req-1');
    expect(String(env.dedupKey)).toBe('EnrollmentCreated:42:1');
  });

  it('readEnrollmentCreatedPayload 拒绝非法载荷', () => {
    const env = buildEnvelope({
      type: 'EnrollmentCreated',
      aggregateType: 'enrollment',
      aggregateId: 1,
      payload: { enrollmentId: 'x' },
    });
    expect(readEnrollmentCreatedPayload(env)).toBeNull();
    expect(readEnrollmentCreatedPayload(buildEnrollmentCreated({ enrollmentId: 9 }))).toEqual({
      enrollmentId: 9,
    });
  });
});
