// src/adapters/http/health/health.controller.ts
import { Controller, Get } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { Public } from '../decorators/public.decorator';

export interface HealthStatus {
  readonly status: 'ok';
  readonly database: 'up' | 'down';
}

/**
 * 存活探针（不挂在全局前缀下）
 */
@Controller('health')
export class HealthController {
  constructor(private readonly dataSource: DataSource) {}

  @Public()
  @Get()
  check(): HealthStatus {
    return { status: 'ok', database: this.dataSource.isInitialized ? 'up' : 'down' };
  }
}
