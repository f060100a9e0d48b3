// src/infrastructure/typeorm/unique-violation.ts
// 识别不同驱动的唯一约束冲突（MySQL ER_DUP_ENTRY / SQLite SQLITE_CONSTRAINT_UNIQUE）

import { QueryFailedError } from 'typeorm';

const MYSQL_DUP_ENTRY_ERRNO = 1062;
const UNIQUE_CODES: ReadonlySet<string> = new Set([
  'ER_DUP_ENTRY',
  'SQLITE_CONSTRAINT_UNIQUE',
  'SQLITE_CONSTRAINT_PRIMARYKEY',
]);

const readField = (source: object, field: 'code' | 'errno'): unknown =>
  field in source ? Reflect.get(source, field) : undefined;

/**
 * 判断错误是否为唯一约束冲突
 * @param error 任意错误
 */
export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) return false;
  const sources: object[] = [error];
  if (typeof error.driverError === 'object' && error.driverError !== null) {
    sources.push(error.driverError);
  }
  return sources.some((source) => {
    const code = readField(source, 'code');
    const errno = readField(source, 'errno');
    return (typeof code === 'string' && UNIQUE_CODES.has(code)) || errno === MYSQL_DUP_ENTRY_ERRNO;
  });
}
