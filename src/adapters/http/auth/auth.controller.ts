// src/adapters/http/auth/auth.controller.ts
import type { Actor } from '@app-types/auth/session.types';
import type { TokenPair } from '@app-types/jwt.types';
import type { UserProfileView } from '@app-types/models/user.types';
import { ValidateInput } from '@core/common/errors/validate-input.decorator';
import { Body, Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { GetProfileUsecase } from '@src/usecases/auth/get-profile.usecase';
import { LoginWithPasswordUsecase } from '@src/usecases/auth/login-with-password.usecase';
import { RefreshAccessTokenUsecase } from '@src/usecases/auth/refresh-access-token.usecase';
import { RegisterUserUsecase } from '@src/usecases/auth/register-user.usecase';
import { currentActor } from '../decorators/current-actor.decorator';
import { Public } from '../decorators/public.decorator';
import { LoginInput, RefreshInput, RegisterInput } from './dto/auth.input';

/**
 * 认证 REST 控制器：注册、登录、刷新令牌、当前用户资料
 */
@Controller('auth')
@ValidateInput()
export class AuthController {
  constructor(
    private readonly registerUserUsecase: RegisterUserUsecase,
    private readonly loginWithPasswordUsecase: LoginWithPasswordUsecase,
    private readonly refreshAccessTokenUsecase: RefreshAccessTokenUsecase,
    private readonly getProfileUsecase: GetProfileUsecase,
  ) {}

  @Public()
  @Post('register')
  @HttpCode(HttpStatus.CREATED)
  async register(@Body() body: RegisterInput): Promise<UserProfileView> {
    return this.registerUserUsecase.execute({
      username: body.username,
      email: body.email,
      password: body.password,
      role: body.role,
    });
  }

  @Public()
  @Post('login')
  @HttpCode(HttpStatus.OK)
  async login(@Body() body: LoginInput): Promise<TokenPair> {
    return this.loginWithPasswordUsecase.execute(body);
  }

  @Public()
  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  async refresh(@Body() body: RefreshInput): Promise<{ readonly access: string }> {
    return this.refreshAccessTokenUsecase.execute(body.refresh);
  }

  @Get('me')
  async me(@currentActor() actor: Actor): Promise<UserProfileView> {
    return this.getProfileUsecase.execute(actor);
  }
}
