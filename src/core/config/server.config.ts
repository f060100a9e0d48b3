// src/core/config/server.config.ts
import { registerAs } from '@nestjs/config';

const parsePort = (raw: string | undefined): number => {
  const port = Number.parseInt(raw ?? '', 10);
  return Number.isInteger(port) && port > 0 && port < 65536 ? port : 3000;
};

/** 逗号分隔的来源列表；空列表表示反射请求来源 */
const parseOrigins = (raw: string | undefined): string[] =>
  (raw ?? '')
    .split(',')
    .map((o) => o.trim())
    .filter((o) => o.length > 0);

export default registerAs('server', () => ({
  host: process.env.APP_HOST || '127.0.0.1',
  port: parsePort(process.env.APP_PORT),
  // 置空表示不加前缀；/health 始终不带前缀
  globalPrefix: process.env.APP_GLOBAL_PREFIX ?? 'api/v1',
  cors: {
    enabled: process.env.APP_CORS_ENABLED !== 'false',
    origins: parseOrigins(process.env.APP_CORS_ORIGINS),
  },
}));
