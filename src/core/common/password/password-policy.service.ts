// src/core/common/password/password-policy.service.ts

import { Injectable } from '@nestjs/common';

/**
 * 密码策略配置
 */
export interface PasswordPolicyConfig {
  /** 最小长度 */
  minLength: number;
  /** 最大长度 */
  maxLength: number;
  /** 是否检查常见密码黑名单 */
  checkBlacklist: boolean;
  /** 是否拒绝纯数字密码 */
  rejectNumericOnly: boolean;
  /** 与用户属性的相似度上限（0..1，达到即拒绝） */
  maxSimilarity: number;
}

/**
 * 密码校验结果
 */
export interface PasswordValidationResult {
  /** 是否通过校验 */
  isValid: boolean;
  /** 错误信息列表 */
  errors: string[];
}

/**
 * 参与相似度比较的用户属性
 */
export interface PasswordUserAttributes {
  readonly username?: string;
  readonly email?: string;
}

/**
 * 密码策略服务
 * 长度、常见密码、纯数字与用户属性相似度四项检查
 */
@Injectable()
export class PasswordPolicyService {
  private readonly defaultConfig: PasswordPolicyConfig = {
    minLength: 8,
    maxLength: 128,
    checkBlacklist: true,
    rejectNumericOnly: true,
    maxSimilarity: 0.7,
  };

  /**
   * 常见弱密码黑名单
   */
  private readonly commonWeakPasswords: ReadonlySet<string> = new Set([
    '12345678',
    '123456789',
    '1234567890',
    '87654321',
    'qwerty123',
    'qwertyui',
    'asdfghjk',
    'qwer1234',
    'password',
    'password1',
    'password123',
    'iloveyou',
    'sunshine',
    'princess',
    'football',
    'baseball',
    'welcome1',
    'admin123',
    'letmein1',
    'abc12345',
    '11111111',
    '00000000',
  ]);

  /**
   * 验证密码是否符合策略要求
   *
   * @param password 待验证的密码
   * @param user 用户属性（用于相似度检查）
   * @param config 密码策略配置（可选，使用默认配置）
   */
  validatePassword(
    password: string,
    user: PasswordUserAttributes = {},
    config: Partial<PasswordPolicyConfig> = {},
  ): PasswordValidationResult {
    const finalConfig = { ...this.defaultConfig, ...config };
    const normalized = password.normalize('NFKC');
    const errors: string[] = [];

    const similarTo = this.findSimilarAttribute(normalized, user, finalConfig.maxSimilarity);
    if (similarTo) {
      errors.push(`The password is too similar to the ${similarTo}.`);
    }

    if (normalized.length < finalConfig.minLength) {
      errors.push(
        `This password is too short. It must contain at least ${finalConfig.minLength} characters.`,
      );
    }

    if (normalized.length > finalConfig.maxLength) {
      errors.push(
        `This password is too long. It must contain at most ${finalConfig.maxLength} characters.`,
      );
    }

    if (finalConfig.checkBlacklist && this.commonWeakPasswords.has(normalized.toLowerCase())) {
      errors.push('This password is too common.');
    }

    if (finalConfig.rejectNumericOnly && /^\d+$/.test(normalized)) {
      errors.push('This password is entirely numeric.');
    }

    return { isValid: errors.length === 0, errors };
  }

  /**
   * 找出与密码过于相似的用户属性名
   */
  private findSimilarAttribute(
    password: string,
    user: PasswordUserAttributes,
    maxSimilarity: number,
  ): string | null {
    const lowerPassword = password.toLowerCase();
    const candidates: ReadonlyArray<readonly [string, string | undefined]> = [
      ['username', user.username],
      ['email address', user.email],
    ];

    for (const [name, raw] of candidates) {
      if (!raw) continue;
      const value = raw.toLowerCase();
      // 邮箱还会拆分为 local / domain 片段分别比较
      const parts = [value, ...value.split(/\W+/).filter((p) => p.length > 0)];
      if (parts.some((part) => similarity(lowerPassword, part) >= maxSimilarity)) {
        return name;
      }
    }
    return null;
  }
}

/**
 * 基于最长公共子串的相似度：2 * LCS / (|a| + |b|)
 */
export function similarity(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;
  let longest = 0;
  let prev: number[] = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i += 1) {
    const curr: number[] = new Array<number>(b.length + 1).fill(0);
    for (let j = 1; j <= b.length; j += 1) {
      if (a[i - 1] === b[j - 1]) {
        curr[j] = prev[j - 1] + 1;
        if (curr[j] > longest) longest = curr[j];
      }
    }
    prev = curr;
  }
  return (2 * longest) / (a.length + b.length);
}
