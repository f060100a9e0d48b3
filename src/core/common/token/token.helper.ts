// src/core/common/token/token.helper.ts

import type { JwtPayload, TokenPair } from '@app-types/jwt.types';
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JsonWebTokenError, JwtService, TokenExpiredError } from '@nestjs/jwt';
import { PinoLogger } from 'nestjs-pino';
import { AUTH_ERROR, DomainError } from '../errors/domain-error';

/**
 * 令牌签发所需的用户信息
 */
export type TokenSubject = {
  readonly id: number;
  readonly username: string;
};

const tokenPrefix = (token: string): string => `${token.substring(0, 12)}...`;

/**
 * Token 助手类
 * 访问令牌与刷新令牌共用密钥，payload.type 区分用途
 */
@Injectable()
export class TokenHelper {
  constructor(
    private readonly jwtService: JwtService,
    private readonly configService: ConfigService,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(TokenHelper.name);
  }

  /**
   * 生成访问令牌（有效期取 jwt.expiresIn）
   */
  generateAccessToken(subject: TokenSubject): string {
    const payload: JwtPayload = { sub: subject.id, username: subject.username, type: 'access' };
    return this.jwtService.sign(payload);
  }

  /**
   * 生成刷新令牌（有效期取 jwt.refreshExpiresIn）
   */
  generateRefreshToken(subject: TokenSubject): string {
    const payload: JwtPayload = { sub: subject.id, username: subject.username, type: 'refresh' };
    return this.jwtService.sign(payload, {
      expiresIn: this.configService.get<string>('jwt.refreshExpiresIn', '7d'),
    });
  }

  generateTokenPair(subject: TokenSubject): TokenPair {
    return {
      access: this.generateAccessToken(subject),
      refresh: this.generateRefreshToken(subject),
    };
  }

  /**
   * 校验刷新令牌：签名、过期、issuer/audience 与 type 均需通过
   * @throws DomainError(TOKEN_INVALID)
   */
  verifyRefreshToken(token: string): JwtPayload {
    const payload = this.verify(token);
    if (payload.type !== 'refresh') {
      throw new DomainError(AUTH_ERROR.TOKEN_INVALID, 'Token is invalid or expired', {
        reason: 'wrong token type',
      });
    }
    return payload;
  }

  private verify(token: string): JwtPayload {
    try {
      return this.jwtService.verify<JwtPayload>(token);
    } catch (error) {
      if (error instanceof TokenExpiredError) {
        // 过期是正常行为，不记录
        throw new DomainError(AUTH_ERROR.TOKEN_INVALID, 'Token is invalid or expired', {
          reason: 'expired',
        });
      }
      if (error instanceof JsonWebTokenError) {
        this.logger.warn(
          { error: error.message, tokenPrefix: tokenPrefix(token) },
          'JWT 手动验证失败',
        );
      }
      throw new DomainError(
        AUTH_ERROR.TOKEN_INVALID,
        'Token is invalid or expired',
        { reason: 'malformed' },
        error,
      );
    }
  }
}
