// src/modules/auth/auth.module.ts

import { PasswordModule } from '@core/common/password/password.module';
import { TokenHelper } from '@core/common/token/token.helper';
import { CoreJwtModule } from '@core/jwt/jwt.module';
import { UserServiceModule } from '@modules/user/user-service.module';
import { Module } from '@nestjs/common';
import { PassportModule } from '@nestjs/passport';
import { GetProfileUsecase } from '@src/usecases/auth/get-profile.usecase';
import { LoginWithPasswordUsecase } from '@src/usecases/auth/login-with-password.usecase';
import { RefreshAccessTokenUsecase } from '@src/usecases/auth/refresh-access-token.usecase';
import { RegisterUserUsecase } from '@src/usecases/auth/register-user.usecase';
import { JwtStrategy } from './strategies/jwt.strategy';

/**
 * 认证模块：JWT 策略、令牌签发与注册 / 登录用例
 */
@Module({
  imports: [
    UserServiceModule,
    PasswordModule,
    CoreJwtModule,
    PassportModule.register({ defaultStrategy: 'jwt' }),
  ],
  providers: [
    TokenHelper,
    JwtStrategy,
    RegisterUserUsecase,
    LoginWithPasswordUsecase,
    RefreshAccessTokenUsecase,
    GetProfileUsecase,
  ],
  exports: [
    JwtStrategy,
    // 导出 usecases 供 HttpAdapterModule 使用
    RegisterUserUsecase,
    LoginWithPasswordUsecase,
    RefreshAccessTokenUsecase,
    GetProfileUsecase,
  ],
})
export class AuthModule {}
