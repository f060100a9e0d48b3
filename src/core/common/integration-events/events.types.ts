// src/core/common/integration-events/events.types.ts
/**
 * 事件类型枚举（采用过去式命名）
 * - EnrollmentCreated：选课成功后的通知任务
 * - DailyReportRequested / EnrollmentCleanupRequested：定时维护任务
 */
export type IntegrationEventType =
  | 'EnrollmentCreated'
  | 'DailyReportRequested'
  | 'EnrollmentCleanupRequested';

export type MaintenanceTaskType = Extract<
  IntegrationEventType,
  'DailyReportRequested' | 'EnrollmentCleanupRequested'
>;

export type ISO8601String = string & { readonly brand: 'ISO8601' };
export type DedupKey = string & { readonly brand: 'DedupKey' };

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue =
  | JsonPrimitive
  | { readonly [k: string]: JsonValue }
  | ReadonlyArray<JsonValue>;

/**
 * 集成事件信封类型（用于 Outbox 投递）
 */
export interface IntegrationEventEnvelope<T extends IntegrationEventType = IntegrationEventType> {
  readonly type: T;
  readonly aggregateType: string;
  readonly aggregateId: number | string;
  readonly schemaVersion: number;
  readonly payload: Readonly<Record<string, JsonValue>>;
  readonly dedupKey?: DedupKey;
  readonly correlationId?: string;
  readonly occurredAt: ISO8601String;
  readonly deliverAfter?: ISO8601String;
  readonly priority?: number;
}

/**
 * 构造标准事件信封（纯函数）
 * @param input 输入参数对象
 */
export function buildEnvelope<T extends IntegrationEventType>(input: {
  readonly type: T;
  readonly aggregateType: string;
  readonly aggregateId: number | string;
  readonly schemaVersion?: number;
  readonly payload?: Readonly<Record<string, JsonValue>>;
  readonly dedupKey?: string;
  readonly correlationId?: string;
  readonly occurredAt?: Date;
  readonly deliverAfter?: Date;
  readonly priority?: number;
}): IntegrationEventEnvelope<T> {
  const occurredAt = (input.occurredAt ?? new Date()).toISOString() as ISO8601String;
  const deliverAfter = input.deliverAfter
    ? (input.deliverAfter.toISOString() as ISO8601String)
    : undefined;
  const schemaVersion = input.schemaVersion ?? 1;
  const dedupKey = (input.dedupKey ??
    `${input.type}:${input.aggregateId}:${schemaVersion}`) as DedupKey;
  return {
    type: input.type,
    aggregateType: input.aggregateType,
    aggregateId: input.aggregateId,
    schemaVersion,
    payload: input.payload ?? {},
    dedupKey,
    correlationId: input.correlationId,
    occurredAt,
    deliverAfter,
    priority: input.priority,
  };
}

/**
 * 选课创建事件的载荷
 */
export type EnrollmentCreatedPayload = {
  readonly enrollmentId: number;
};

/**
 * 构造 EnrollmentCreated 事件信封
 * @param input 选课 ID 与可选的请求关联 ID
 */
export function buildEnrollmentCreated(input: {
  readonly enrollmentId: number;
  readonly correlationId?: string;
}): IntegrationEventEnvelope<'EnrollmentCreated'> {
  return buildEnvelope({
    type: 'EnrollmentCreated',
    aggregateType: 'enrollment',
    aggregateId: input.enrollmentId,
    payload: { enrollmentId: input.enrollmentId },
    correlationId: input.correlationId,
  });
}

/**
 * 从信封中读取 enrollmentId；载荷不合法时返回 null
 */
export function readEnrollmentCreatedPayload(
  envelope: IntegrationEventEnvelope,
): EnrollmentCreatedPayload | null {
  const raw = envelope.payload.enrollmentId;
  if (typeof raw !== 'number' || !Number.isInteger(raw) || raw <= 0) return null;
  return { enrollmentId: raw };
}

/**
 * 构造定时维护任务信封
 * dedupKey 按周期编号生成：同一周期内重复触发只会入箱一次
 * @param input 任务类型、周期编号与触发时间
 */
export function buildMaintenanceTask<T extends MaintenanceTaskType>(input: {
  readonly type: T;
  readonly period: number;
  readonly occurredAt?: Date;
}): IntegrationEventEnvelope<T> {
  return buildEnvelope({
    type: input.type,
    aggregateType: 'maintenance',
    aggregateId: input.period,
    payload: { period: input.period },
    dedupKey: `${input.type}:${input.period}`,
    occurredAt: input.occurredAt,
  });
}
