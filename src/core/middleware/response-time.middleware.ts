// src/core/middleware/response-time.middleware.ts

import { Injectable, NestMiddleware } from '@nestjs/common';
import type { NextFunction, Request, Response } from 'express';
import responseTime from 'response-time';

/** 响应头：整数毫秒，不带单位 */
export const RESPONSE_TIME_HEADER = 'X-Response-Time-ms';

/**
 * 响应耗时中间件
 * 在响应头写出前计算耗时，错误响应同样带上该头
 */
@Injectable()
export class ResponseTimeMiddleware implements NestMiddleware {
  private readonly handler = responseTime({
    digits: 0,
    header: RESPONSE_TIME_HEADER,
    suffix: false,
  });

  use(req: Request, res: Response, next: NextFunction): void {
    this.handler(req, res, next);
  }
}
