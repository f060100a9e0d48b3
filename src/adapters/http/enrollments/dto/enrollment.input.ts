// src/adapters/http/enrollments/dto/enrollment.input.ts
import { Type } from 'class-transformer';
import { IsDefined, IsInt, IsOptional } from 'class-validator';
import { REQUIRED_MESSAGE } from '../../dto.transforms';
import { PageQueryDto } from '../../pagination.query';

/**
 * 选课请求体；student 由当前用户决定，客户端传入会被丢弃
 */
export class CreateEnrollmentInput {
  @IsDefined({ message: REQUIRED_MESSAGE })
  @Type(() => Number)
  @IsInt({ message: 'A valid integer is required.' })
  course!: number;
}

export class ListEnrollmentsQuery extends PageQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'A valid integer is required.' })
  course?: number;
}
