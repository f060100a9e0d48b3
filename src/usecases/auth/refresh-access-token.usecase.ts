// src/usecases/auth/refresh-access-token.usecase.ts
import { AUTH_ERROR, DomainError } from '@core/common/errors/domain-error';
import { TokenHelper } from '@core/common/token/token.helper';
import { UserService } from '@modules/user/user.service';
import { Injectable } from '@nestjs/common';

/**
 * 用刷新令牌换取新的访问令牌；用户已被删除时视为令牌无效
 */
@Injectable()
export class RefreshAccessTokenUsecase {
  constructor(
    private readonly userService: UserService,
    private readonly tokenHelper: TokenHelper,
  ) {}

  async execute(refreshToken: string): Promise<{ readonly access: string }> {
    const payload = this.tokenHelper.verifyRefreshToken(refreshToken);
    const user = await this.userService.findById(payload.sub);
    if (!user) {
      throw new DomainError(AUTH_ERROR.TOKEN_INVALID, 'Token is invalid or expired', {
        reason: 'user not found',
      });
    }
    return {
      access: this.tokenHelper.generateAccessToken({ id: user.id, username: user.username }),
    };
  }
}
