// src/adapters/http/courses/dto/course.input.ts
/* eslint-disable @typescript-eslint/naming-convention */
import { Type } from 'class-transformer';
import {
  IsBoolean,
  IsDefined,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
  MinLength,
} from 'class-validator';
import { REQUIRED_MESSAGE, Trim } from '../../dto.transforms';
import { PageQueryDto } from '../../pagination.query';

const TITLE_MIN_MESSAGE = 'Title must be at least 3 characters long.';
const TITLE_MAX_MESSAGE = 'Ensure this field has no more than 200 characters.';
const PRICE_MESSAGE = 'A valid number with at most 2 decimal places is required.';
const PRICE_MIN_MESSAGE = 'Price must be >= 0.';
const PRICE_MAX_MESSAGE = 'Ensure that there are no more than 10 digits in total.';

/**
 * 创建课程 / PUT 全量更新
 * owner 不在白名单内，客户端传入会被丢弃
 */
export class CreateCourseInput {
  @IsDefined({ message: REQUIRED_MESSAGE })
  @Trim()
  @MinLength(3, { message: TITLE_MIN_MESSAGE })
  @MaxLength(200, { message: TITLE_MAX_MESSAGE })
  @IsString({ message: 'Not a valid string.' })
  title!: string;

  @IsOptional()
  @IsString({ message: 'Not a valid string.' })
  description?: string;

  @IsOptional()
  @Type(() => Number)
  @Min(0, { message: PRICE_MIN_MESSAGE })
  @Max(99999999.99, { message: PRICE_MAX_MESSAGE })
  @IsNumber({ allowNaN: false, allowInfinity: false, maxDecimalPlaces: 2 }, { message: PRICE_MESSAGE })
  price?: number;

  @IsOptional()
  @IsBoolean({ message: 'Must be a valid boolean.' })
  is_published?: boolean;
}

/**
 * PATCH 部分更新：字段均可省略
 */
export class PatchCourseInput {
  @IsOptional()
  @Trim()
  @MinLength(3, { message: TITLE_MIN_MESSAGE })
  @MaxLength(200, { message: TITLE_MAX_MESSAGE })
  @IsString({ message: 'Not a valid string.' })
  title?: string;

  @IsOptional()
  @IsString({ message: 'Not a valid string.' })
  description?: string;

  @IsOptional()
  @Type(() => Number)
  @Min(0, { message: PRICE_MIN_MESSAGE })
  @Max(99999999.99, { message: PRICE_MAX_MESSAGE })
  @IsNumber({ allowNaN: false, allowInfinity: false, maxDecimalPlaces: 2 }, { message: PRICE_MESSAGE })
  price?: number;

  @IsOptional()
  @IsBoolean({ message: 'Must be a valid boolean.' })
  is_published?: boolean;
}

/**
 * 课程列表查询：?search=&ordering=-price&page=&page_size=
 * 不认识的 ordering 值按默认排序处理
 */
export class ListCoursesQuery extends PageQueryDto {
  @IsOptional()
  @IsString()
  search?: string;

  @IsOptional()
  @IsString()
  ordering?: string;
}
