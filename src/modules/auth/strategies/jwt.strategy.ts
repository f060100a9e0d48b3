// src/modules/auth/strategies/jwt.strategy.ts

import type { AuthenticatedUser } from '@app-types/auth/session.types';
import { JwtPayload } from '@app-types/jwt.types';
import { UserService } from '@modules/user/user.service';
import { Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PassportStrategy } from '@nestjs/passport';
import { PinoLogger } from 'nestjs-pino';
import { ExtractJwt, JwtFromRequestFunction, Strategy } from 'passport-jwt';

/**
 * JWT 认证策略
 * 每个请求重新加载用户记录：角色以数据库实时值为准，而不是令牌签发时的快照
 */
@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(
    configService: ConfigService,
    private readonly userService: UserService,
    private readonly logger: PinoLogger,
  ) {
    const secret = configService.get<string>('jwt.secret');
    const issuer = configService.get<string>('jwt.issuer');
    const audience = configService.get<string>('jwt.audience');

    if (!secret) {
      throw new Error('JWT secret 配置缺失');
    }

    const jwtExtractor: JwtFromRequestFunction = ExtractJwt.fromAuthHeaderAsBearerToken();

    super({
      jwtFromRequest: jwtExtractor,
      ignoreExpiration: false,
      secretOrKey: secret,
      algorithms: ['HS256'],
      issuer: issuer || undefined,
      audience: audience || undefined,
    });

    this.logger.setContext(JwtStrategy.name);
  }

  /**
   * 验证 JWT payload 并返回用户信息（注入到 request.user）
   * @param payload JWT 载荷
   */
  async validate(payload: JwtPayload): Promise<AuthenticatedUser> {
    if (payload.type !== 'access') {
      throw new UnauthorizedException('Given token not valid for any token type');
    }

    const user = await this.userService.findById(payload.sub);
    if (!user) {
      this.logger.info({ userId: payload.sub }, 'Token subject no longer exists');
      throw new UnauthorizedException('User not found');
    }

    return { id: user.id, username: user.username, role: user.role };
  }
}
