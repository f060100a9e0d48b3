// src/adapters/http/pipes/parse-id.pipe.ts
import { NotFoundException, ParseIntPipe } from '@nestjs/common';

/**
 * 路径 ID 解析：非整数 ID 视为资源不存在
 */
export const parseIdPipe = (): ParseIntPipe =>
  new ParseIntPipe({ exceptionFactory: () => new NotFoundException('Not found.') });
