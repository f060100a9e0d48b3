// src/core/jwt/jwt.module.ts

import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtModule, type JwtModuleOptions } from '@nestjs/jwt';

const jwtOptionsFactory = (config: ConfigService): JwtModuleOptions => {
  const issuer = config.get<string>('jwt.issuer');
  const audience = config.get<string>('jwt.audience');
  return {
    secret: config.get<string>('jwt.secret'),
    // 默认签发访问令牌；刷新令牌由 TokenHelper 单独指定有效期
    signOptions: {
      expiresIn: config.get<string>('jwt.expiresIn', '30m'),
      algorithm: 'HS256',
      issuer,
      audience,
    },
    verifyOptions: { algorithms: ['HS256'], issuer, audience },
  };
};

/**
 * 访问令牌与刷新令牌共用密钥，通过 payload.type 区分
 */
@Module({
  imports: [JwtModule.registerAsync({ inject: [ConfigService], useFactory: jwtOptionsFactory })],
  exports: [JwtModule],
})
export class CoreJwtModule {}
