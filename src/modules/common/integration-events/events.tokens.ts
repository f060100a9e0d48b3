// src/modules/common/integration-events/events.tokens.ts

/**
 * 集成事件相关注入令牌
 * Writer 与 Store 由同一个内存 Outbox 实例提供
 */
export const INTEGRATION_EVENTS_TOKENS = {
  OUTBOX_WRITER_PORT: Symbol('EVENTS.OUTBOX_WRITER'),
  OUTBOX_STORE_PORT: Symbol('EVENTS.OUTBOX_STORE'),
  OUTBOX_DISPATCHER_PORT: Symbol('EVENTS.OUTBOX_DISPATCHER'),
  HANDLERS: Symbol('EVENTS.HANDLERS'),
  // 选课通知出口（邮件等），默认实现只写日志
  ENROLLMENT_NOTIFIER: Symbol('EVENTS.ENROLLMENT_NOTIFIER'),
} as const;
