// src/core/config/jwt.config.ts

import { registerAs } from '@nestjs/config';

export default registerAs('jwt', () => ({
  // 用于签名 JWT 的密钥（生产环境必须通过环境变量覆盖）
  secret: process.env.JWT_SECRET || 'dev-placeholder-secret',

  // Access Token 有效期
  expiresIn: process.env.JWT_EXPIRES_IN || '30m',

  // Refresh Token 有效期
  refreshExpiresIn: process.env.JWT_REFRESH_EXPIRES_IN || '7d',

  issuer: process.env.JWT_ISSUER || 'course-enrollment-api',
  audience: process.env.JWT_AUDIENCE || 'course-enrollment-web',
}));
