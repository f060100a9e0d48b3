// src/core/config/logger.config.ts
import { ConfigFactory } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { IncomingMessage, ServerResponse } from 'http';

export const REQUEST_ID_HEADER = 'x-request-id';

/**
 * 生成请求 ID：客户端带了 X-Request-ID 就沿用，否则生成 UUID
 * 同时回写到响应头，便于客户端与日志对照
 */
export const genRequestId = (req: IncomingMessage, res: ServerResponse): string => {
  const incoming = req.headers[REQUEST_ID_HEADER];
  const candidate = Array.isArray(incoming) ? incoming[0] : incoming;
  const id = candidate && candidate.trim().length > 0 ? candidate.trim().slice(0, 128) : randomUUID();
  res.setHeader('X-Request-ID', id);
  return id;
};

const customPropsFor4xx = (req: IncomingMessage, res: ServerResponse): Record<string, unknown> => {
  const statusCode = res.statusCode ?? 0;
  if (statusCode >= 400 && statusCode < 500) {
    const forwardedRaw = req.headers?.['x-forwarded-for'];
    const xForwardedFor = Array.isArray(forwardedRaw) ? forwardedRaw.join(',') : forwardedRaw;
    const userAgentRaw = req.headers?.['user-agent'];
    const userAgent = Array.isArray(userAgentRaw) ? userAgentRaw.join(',') : userAgentRaw;

    return {
      remoteAddress: req.socket?.remoteAddress ?? null,
      xForwardedFor: xForwardedFor ?? null,
      method: req.method ?? null,
      url: req.url ?? null,
      userAgent: userAgent ?? null,
    };
  }
  return {};
};

const resolveLevel = (nodeEnv: string | undefined): string => {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (nodeEnv === 'test') return 'silent';
  return nodeEnv === 'production' ? 'info' : 'debug';
};

const loggerConfig: ConfigFactory = () => {
  const nodeEnv = process.env.NODE_ENV;
  const isDev = nodeEnv !== 'production' && nodeEnv !== 'test';
  const logPath = process.env.LOG_PATH || '/var/log/course-enrollment';

  return {
    logger: {
      level: resolveLevel(nodeEnv),
      redactFields: [
        'req.headers.authorization',
        '*.password',
        '*.token',
        '*.refresh',
        '*.access',
      ],
      genReqId: genRequestId,
      customProps: customPropsFor4xx,
      // 自定义日志级别函数
      customLogLevel: (req: IncomingMessage, res: ServerResponse, err?: Error) => {
        if (req.url === '/favicon.ico') return 'silent';
        if (res.statusCode >= 500 || err) return 'error';
        if (res.statusCode >= 400) return 'warn';
        return 'info';
      },
      // 开发环境美化输出；生产写文件；测试不需要 transport
      transport: isDev
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:dd HH:MM:ss',
              messageFormat: '{time} - [{context}] {method} {url} {statusCode} - {msg}',
              ignore: 'hostname,pid,req,context',
            },
          }
        : nodeEnv === 'production'
          ? {
              targets: [
                {
                  target: 'pino/file',
                  options: { destination: `${logPath}/app.log`, mkdir: true },
                  level: 'info',
                },
                {
                  target: 'pino/file',
                  options: { destination: `${logPath}/error.log`, mkdir: true },
                  level: 'error',
                },
              ],
            }
          : undefined,
    },
  };
};

export default loggerConfig;
