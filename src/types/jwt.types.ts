// src/types/jwt.types.ts

/**
 * JWT Payload 类型定义
 */
export type JwtPayload = {
  // 自定义字段
  sub: number; // 用户 ID
  username: string;
  type: 'access' | 'refresh';
  // 自动管理字段
  iat?: number; // 签发时间
  exp?: number; // 过期时间
  iss?: string; // 签发者
  aud?: string | string[]; // 受众
};

/**
 * 登录成功返回的令牌对
 */
export type TokenPair = {
  readonly access: string;
  readonly refresh: string;
};
