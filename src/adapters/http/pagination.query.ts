// src/adapters/http/pagination.query.ts
/* eslint-disable @typescript-eslint/naming-convention */
import type { PageParams } from '@app-types/common/pagination.types';
import { normalizePageParams } from '@core/pagination/pagination.policy';
import { Type } from 'class-transformer';
import { IsInt, IsOptional, Min } from 'class-validator';

/**
 * 页码分页查询参数：?page=2&page_size=50
 *
 * class-validator 按声明的逆序执行校验，类型校验写在最靠近属性的位置，
 * 配合 stopAtFirstError 时先报告类型错误
 */
export class PageQueryDto {
  @IsOptional()
  @Type(() => Number)
  @Min(1, { message: 'Ensure this value is greater than or equal to 1.' })
  @IsInt({ message: 'A valid integer is required.' })
  page?: number;

  @IsOptional()
  @Type(() => Number)
  @Min(1, { message: 'Ensure this value is greater than or equal to 1.' })
  @IsInt({ message: 'A valid integer is required.' })
  page_size?: number;
}

export const toPageParams = (query: PageQueryDto): PageParams =>
  normalizePageParams({ page: query.page, pageSize: query.page_size });
