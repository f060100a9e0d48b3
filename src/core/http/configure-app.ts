// src/core/http/configure-app.ts
import type { INestApplication } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

/**
 * 应用级 HTTP 设置，启动入口与 e2e 测试共用
 * 路由末尾斜杠可选：express 默认即非严格路由，这里不再改动
 */
export function configureApp(app: INestApplication): void {
  const config = app.get(ConfigService);

  const prefix = config.get<string>('server.globalPrefix', 'api/v1');
  if (prefix) {
    app.setGlobalPrefix(prefix, { exclude: ['health'] });
  }

  if (config.get<boolean>('server.cors.enabled', true)) {
    const origins = config.get<string[]>('server.cors.origins', []);
    app.enableCors({ origin: origins.length > 0 ? origins : true });
  }
}
