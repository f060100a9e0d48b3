// src/app.module.ts

import { Module } from '@nestjs/common';
import { APP_FILTER, APP_GUARD } from '@nestjs/core';
import { HttpAdapterModule } from './adapters/http/http-adapter.module';
import { JwtAuthGuard } from './adapters/http/guards/jwt-auth.guard';
import { ProblemDetailsFilter } from './core/common/filters/problem-details.filter';
import { AppConfigModule } from './core/config/config.module';
import { DatabaseModule } from './core/database/database.module';
import { LoggerModule } from './core/logger/logger.module';
import { MiddlewareModule } from './core/middleware/middleware.module';
import { IntegrationEventsModule } from './modules/common/integration-events/integration-events.module';

@Module({
  imports: [
    AppConfigModule,
    LoggerModule,
    DatabaseModule,
    // 应用级中间件（响应耗时头）
    MiddlewareModule,
    // REST 适配器（控制器 + 用例）
    HttpAdapterModule,
    // 集成事件模块（内存 Outbox + 调度器）
    IntegrationEventsModule,
  ],
  providers: [
    {
      provide: APP_FILTER,
      useClass: ProblemDetailsFilter,
    },
    // 全局认证：未标记 @Public() 的路由都需要有效的访问令牌
    {
      provide: APP_GUARD,
      useClass: JwtAuthGuard,
    },
  ],
})
export class AppModule {}
