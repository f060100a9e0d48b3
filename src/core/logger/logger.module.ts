// src/core/logger/logger.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import type { IncomingMessage } from 'http';
import { LoggerModule as PinoLoggerModule } from 'nestjs-pino';
import type { Options } from 'pino-http';

// 健康检查由探针高频调用，不记访问日志
const isHealthProbe = (req: IncomingMessage): boolean => req.url?.startsWith('/health') ?? false;

/**
 * pino 日志模块：请求日志、请求 ID、脱敏字段均来自 logger 配置段
 */
@Module({
  imports: [
    ConfigModule,
    PinoLoggerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        pinoHttp: {
          level: config.get<string>('logger.level', 'info'),
          transport: config.get<Options['transport']>('logger.transport'),
          redact: config.get<string[]>('logger.redactFields', []),
          genReqId: config.get<Options['genReqId']>('logger.genReqId'),
          customProps: config.get<Options['customProps']>('logger.customProps'),
          customLogLevel: config.get<Options['customLogLevel']>('logger.customLogLevel'),
          autoLogging: { ignore: isHealthProbe },
        },
      }),
    }),
  ],
})
export class LoggerModule {}
