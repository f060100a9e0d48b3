// src/adapters/http/lessons/dto/lesson.input.ts
/* eslint-disable @typescript-eslint/naming-convention */
import { Type } from 'class-transformer';
import {
  IsDefined,
  IsInt,
  IsOptional,
  IsString,
  MaxLength,
  Min,
  MinLength,
} from 'class-validator';
import { REQUIRED_MESSAGE, Trim } from '../../dto.transforms';
import { PageQueryDto } from '../../pagination.query';

const INT_MESSAGE = 'A valid integer is required.';
const TITLE_MIN_MESSAGE = 'Title must be at least 3 characters long.';
const TITLE_MAX_MESSAGE = 'Ensure this field has no more than 200 characters.';
const DURATION_MIN_MESSAGE = 'Duration must be >= 1 minute.';
const ORDER_MIN_MESSAGE = 'Ensure this value is greater than or equal to 1.';

export class CreateLessonInput {
  @IsDefined({ message: REQUIRED_MESSAGE })
  @Type(() => Number)
  @IsInt({ message: INT_MESSAGE })
  course!: number;

  @IsDefined({ message: REQUIRED_MESSAGE })
  @Trim()
  @MinLength(3, { message: TITLE_MIN_MESSAGE })
  @MaxLength(200, { message: TITLE_MAX_MESSAGE })
  @IsString({ message: 'Not a valid string.' })
  title!: string;

  @IsOptional()
  @IsString({ message: 'Not a valid string.' })
  content?: string;

  @IsOptional()
  @Type(() => Number)
  @Min(1, { message: DURATION_MIN_MESSAGE })
  @IsInt({ message: INT_MESSAGE })
  duration_min?: number;

  @IsOptional()
  @Type(() => Number)
  @Min(1, { message: ORDER_MIN_MESSAGE })
  @IsInt({ message: INT_MESSAGE })
  order_index?: number;
}

/**
 * 课时更新（PUT / PATCH 共用）；course 字段不可修改，传入会被丢弃
 */
export class UpdateLessonInput {
  @IsOptional()
  @Trim()
  @MinLength(3, { message: TITLE_MIN_MESSAGE })
  @MaxLength(200, { message: TITLE_MAX_MESSAGE })
  @IsString({ message: 'Not a valid string.' })
  title?: string;

  @IsOptional()
  @IsString({ message: 'Not a valid string.' })
  content?: string;

  @IsOptional()
  @Type(() => Number)
  @Min(1, { message: DURATION_MIN_MESSAGE })
  @IsInt({ message: INT_MESSAGE })
  duration_min?: number;

  @IsOptional()
  @Type(() => Number)
  @Min(1, { message: ORDER_MIN_MESSAGE })
  @IsInt({ message: INT_MESSAGE })
  order_index?: number;
}

export class ListLessonsQuery extends PageQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: INT_MESSAGE })
  course?: number;
}
