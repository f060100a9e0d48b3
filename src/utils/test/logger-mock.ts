// src/utils/test/logger-mock.ts
import type { PinoLogger } from 'nestjs-pino';

/**
 * PinoLogger 的 jest 替身，方法均为 jest.fn
 */
export function createLoggerMock() {
  return {
    setContext: jest.fn(),
    trace: jest.fn(),
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    fatal: jest.fn(),
  };
}

export type LoggerMock = ReturnType<typeof createLoggerMock>;

/**
 * 以 PinoLogger 形态注入替身
 */
export const asPinoLogger = (mock: LoggerMock): PinoLogger => mock as unknown as PinoLogger;
