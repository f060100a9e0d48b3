// src/usecases/auth/login-with-password.usecase.ts
import type { TokenPair } from '@app-types/jwt.types';
import { AUTH_ERROR, DomainError } from '@core/common/errors/domain-error';
import { PasswordPbkdf2Helper } from '@core/common/password/password.pbkdf2.helper';
import { TokenHelper } from '@core/common/token/token.helper';
import { UserService } from '@modules/user/user.service';
import { Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';

export const INVALID_CREDENTIALS_MESSAGE = 'No active account found with the given credentials';

/**
 * 用户名 + 密码登录，签发访问 / 刷新令牌
 * 用户不存在与密码错误返回同一错误，不区分
 */
@Injectable()
export class LoginWithPasswordUsecase {
  constructor(
    private readonly userService: UserService,
    private readonly tokenHelper: TokenHelper,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(LoginWithPasswordUsecase.name);
  }

  async execute(input: {
    readonly username: string;
    readonly password: string;
  }): Promise<TokenPair> {
    const user = await this.userService.findByUsername(input.username);
    const ok =
      user !== null &&
      PasswordPbkdf2Helper.verifyPassword(input.password, user.passwordSalt, user.passwordHash);
    if (!user || !ok) {
      this.logger.info({ username: input.username.trim() }, 'Login rejected');
      throw new DomainError(AUTH_ERROR.INVALID_CREDENTIALS, INVALID_CREDENTIALS_MESSAGE);
    }
    return this.tokenHelper.generateTokenPair({ id: user.id, username: user.username });
  }
}
