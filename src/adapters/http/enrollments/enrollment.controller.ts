// src/adapters/http/enrollments/enrollment.controller.ts
import type { Actor } from '@app-types/auth/session.types';
import type { PageResult } from '@app-types/common/pagination.types';
import type { EnrollmentView } from '@app-types/models/course.types';
import { ValidateInput } from '@core/common/errors/validate-input.decorator';
import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { CancelEnrollmentUsecase } from '@src/usecases/enrollment/cancel-enrollment.usecase';
import { EnrollStudentUsecase } from '@src/usecases/enrollment/enroll-student.usecase';
import { ListEnrollmentsUsecase } from '@src/usecases/enrollment/list-enrollments.usecase';
import { CollectionAccess } from '../decorators/collection-access.decorator';
import { currentActor, requestId } from '../decorators/current-actor.decorator';
import { CollectionAccessGuard } from '../guards/collection-access.guard';
import { toPageParams } from '../pagination.query';
import { parseIdPipe } from '../pipes/parse-id.pipe';
import { CreateEnrollmentInput, ListEnrollmentsQuery } from './dto/enrollment.input';

/**
 * 选课 REST 控制器（全部需要登录）
 */
@Controller('enrollments')
@ValidateInput()
export class EnrollmentController {
  constructor(
    private readonly listEnrollmentsUsecase: ListEnrollmentsUsecase,
    private readonly enrollStudentUsecase: EnrollStudentUsecase,
    private readonly cancelEnrollmentUsecase: CancelEnrollmentUsecase,
  ) {}

  @Get()
  async list(
    @currentActor() actor: Actor,
    @Query() query: ListEnrollmentsQuery,
  ): Promise<PageResult<EnrollmentView>> {
    return this.listEnrollmentsUsecase.execute(actor, {
      courseId: query.course,
      page: toPageParams(query),
    });
  }

  @Post()
  @UseGuards(CollectionAccessGuard)
  @CollectionAccess('create', 'enrollment-collection')
  @HttpCode(HttpStatus.CREATED)
  async enroll(
    @currentActor() actor: Actor,
    @requestId() correlationId: string | undefined,
    @Body() body: CreateEnrollmentInput,
  ): Promise<EnrollmentView> {
    return this.enrollStudentUsecase.execute(actor, { courseId: body.course, correlationId });
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async cancel(
    @currentActor() actor: Actor,
    @Param('id', parseIdPipe()) id: number,
  ): Promise<void> {
    await this.cancelEnrollmentUsecase.execute(actor, id);
  }
}
