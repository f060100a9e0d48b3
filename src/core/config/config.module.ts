// src/core/config/config.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import cacheConfig from './cache.config';
import databaseConfig from './database.config';
import jwtConfig from './jwt.config';
import loggerConfig from './logger.config';
import serverConfig from './server.config';

const nodeEnv = process.env.NODE_ENV || 'development';

/**
 * 全局配置模块
 * 环境文件按优先级：env/.env.{NODE_ENV}.local > env/.env.{NODE_ENV} > env/.env
 * 已存在的进程环境变量始终优先于文件
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      envFilePath: [`env/.env.${nodeEnv}.local`, `env/.env.${nodeEnv}`, 'env/.env'],
      load: [serverConfig, loggerConfig, databaseConfig, jwtConfig, cacheConfig],
    }),
  ],
})
export class AppConfigModule {}
