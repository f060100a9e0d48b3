// src/core/common/password/password.pbkdf2.helper.ts
import { pbkdf2Sync, randomBytes, timingSafeEqual } from 'crypto';

const ITERATIONS = 5000;
const KEY_LENGTH = 64;
const DIGEST = 'sha256';

/**
 * PBKDF2 密码哈希工具类
 * 每个用户独立随机盐，哈希以十六进制保存
 */
export class PasswordPbkdf2Helper {
  /**
   * 生成随机盐（32 位十六进制）
   */
  static generateSalt(): string {
    return randomBytes(16).toString('hex');
  }

  /**
   * 根据传入的密码和盐值生成哈希字符串
   * @param password - 用户的密码
   * @param salt - 用于加密的盐值
   */
  static hashPassword(password: string, salt: string): string {
    // 5000 次迭代，64 字节输出长度，SHA-256 算法
    return pbkdf2Sync(password, salt, ITERATIONS, KEY_LENGTH, DIGEST).toString('hex');
  }

  /**
   * 验证密码是否正确（定长比较）
   * @param password - 待验证的密码
   * @param salt - 盐值
   * @param hashedPassword - 已存储的哈希密码
   */
  static verifyPassword(password: string, salt: string, hashedPassword: string): boolean {
    const actual = Buffer.from(this.hashPassword(password, salt), 'hex');
    const expected = Buffer.from(hashedPassword, 'hex');
    if (actual.length !== expected.length) return false;
    return timingSafeEqual(actual, expected);
  }
}
