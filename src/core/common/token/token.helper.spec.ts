/* eslint-disable max-lines-per-function */
// src/core/common/token/token.helper.spec.ts

import type { JwtPayload } from '@app-types/jwt.types';
import { AUTH_ERROR, DomainError } from '@core/common/errors/domain-error';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { Test, TestingModule } from '@nestjs/testing';
import { PinoLogger } from 'nestjs-pino';
import { TokenHelper } from './token.helper';

describe('TokenHelper', () => {
  let tokenHelper: TokenHelper;
  let jwtService: JwtService;

  const subject = { id: 7, username: 'alice' };

  beforeEach(async () => {
    const mockLogger = {
      setContext: jest.fn(),
      warn: jest.fn(),
      error: jest.fn(),
      info: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TokenHelper,
        {
          provide: JwtService,
          useValue: new JwtService({
            secret: 'test-secret',
            signOptions: { expiresIn: '30m', issuer: 'test-issuer', audience: 'test-aud' },
            verifyOptions: { issuer: 'test-issuer', audience: 'test-aud' },
          }),
        },
        {
          provide: ConfigService,
          useValue: new ConfigService({ jwt: { refreshExpiresIn: '7d' } }),
        },
        { provide: PinoLogger, useValue: mockLogger },
      ],
    }).compile();

    tokenHelper = module.get(TokenHelper);
    jwtService = module.get(JwtService);
  });

  it('访问令牌携带 sub / username / type=access', () => {
    const token = tokenHelper.generateAccessToken(subject);
    const payload = jwtService.verify<JwtPayload>(token);
    expect(payload.sub).toBe(7);
    expect(payload.username).toBe('alice');
    expect(payload.type).toBe('access');
    expect(payload.iss).toBe('test-issuer');
  });

  it('刷新令牌有效期为 7 天', () => {
    const token = tokenHelper.generateRefreshToken(subject);
    const payload = jwtService.verify<JwtPayload>(token);
    expect(payload.type).toBe('refresh');
    expect((payload.exp ?? 0) - (payload.iat ?? 0)).toBe(7 * 24 * 3600);
  });

  it('verifyRefreshToken 接受刷新令牌', () => {
    const { refresh } = tokenHelper.generateTokenPair(subject);
    expect(tokenHelper.verifyRefreshToken(refresh).sub).toBe(7);
  });

  it('verifyRefreshToken 拒绝访问令牌', () => {
    const { access } = tokenHelper.generateTokenPair(subject);
    expect(() => tokenHelper.verifyRefreshToken(access)).toThrow(DomainError);
  });

  it('verifyRefreshToken 拒绝格式错误的令牌', () => {
    expect.assertions(2);
    try {
      tokenHelper.verifyRefreshToken('not-a-jwt');
    } catch (e) {
      expect(e).toBeInstanceOf(DomainError);
      expect(e instanceof DomainError && e.code).toBe(AUTH_ERROR.TOKEN_INVALID);
    }
  });
});
