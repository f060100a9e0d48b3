// src/core/middleware/middleware.module.ts

import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { ResponseTimeMiddleware } from './response-time.middleware';

/**
 * 中间件模块
 * 统一管理应用级中间件的注册
 */
@Module({
  providers: [ResponseTimeMiddleware],
})
export class MiddlewareModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(ResponseTimeMiddleware).forRoutes('*');
  }
}
