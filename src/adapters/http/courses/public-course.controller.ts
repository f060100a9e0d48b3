// src/adapters/http/courses/public-course.controller.ts
import { ANONYMOUS } from '@app-types/auth/session.types';
import type { PageResult } from '@app-types/common/pagination.types';
import type { CourseView } from '@app-types/models/course.types';
import { ValidateInput } from '@core/common/errors/validate-input.decorator';
import { Controller, Get, Query, Res } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ListCoursesUsecase } from '@src/usecases/course/courses/list-courses.usecase';
import type { Response } from 'express';
import { Public } from '../decorators/public.decorator';
import { PageQueryDto, toPageParams } from '../pagination.query';

/**
 * 公开课程列表：只读、按匿名可见范围返回，与调用方身份无关
 * 数据读自 courses:list 缓存，响应允许共享缓存（max-age 与列表 TTL 一致）
 */
@Controller('courses-public')
@ValidateInput()
export class PublicCourseController {
  private readonly cacheControl: string;

  constructor(
    private readonly listCoursesUsecase: ListCoursesUsecase,
    config: ConfigService,
  ) {
    const ttl = config.get<number>('cache.listTtlSeconds', 300);
    this.cacheControl = `public, max-age=${ttl}`;
  }

  @Public()
  @Get()
  async list(
    @Query() query: PageQueryDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<PageResult<CourseView>> {
    const result = await this.listCoursesUsecase.execute(ANONYMOUS, {
      page: toPageParams(query),
    });
    // 错误响应不带共享缓存头
    res.setHeader('Cache-Control', this.cacheControl);
    return result;
  }
}
