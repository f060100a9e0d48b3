// src/infrastructure/typeorm/unique-violation.spec.ts
import { QueryFailedError } from 'typeorm';
import { isUniqueViolation } from './unique-violation';

const driverError = (fields: Record<string, unknown>): Error =>
  Object.assign(new Error('driver error'), fields);

describe('isUniqueViolation', () => {
  it('识别 MySQL ER_DUP_ENTRY', () => {
    const err = new QueryFailedError('INSERT', [], driverError({ code: 'ER_DUP_ENTRY', errno: 1062 }));
    expect(isUniqueViolation(err)).toBe(true);
  });

  it('识别 SQLite 唯一约束', () => {
    const err = new QueryFailedError('INSERT', [], driverError({ code: 'SQLITE_CONSTRAINT_UNIQUE' }));
    expect(isUniqueViolation(err)).toBe(true);
  });

  it('其他查询错误与非 QueryFailedError 均返回 false', () => {
    const err = new QueryFailedError('INSERT', [], driverError({ code: 'ER_PARSE_ERROR' }));
    expect(isUniqueViolation(err)).toBe(false);
    expect(isUniqueViolation(new Error('ER_DUP_ENTRY'))).toBe(false);
    expect(isUniqueViolation(null)).toBe(false);
  });
});
