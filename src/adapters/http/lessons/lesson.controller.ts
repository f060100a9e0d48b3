// src/adapters/http/lessons/lesson.controller.ts
import type { Actor } from '@app-types/auth/session.types';
import type { PageResult } from '@app-types/common/pagination.types';
import type { LessonView } from '@app-types/models/course.types';
import { ValidateInput } from '@core/common/errors/validate-input.decorator';
import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Patch,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { CreateLessonUsecase } from '@src/usecases/course/lessons/create-lesson.usecase';
import { DeleteLessonUsecase } from '@src/usecases/course/lessons/delete-lesson.usecase';
import { GetLessonUsecase } from '@src/usecases/course/lessons/get-lesson.usecase';
import { ListLessonsUsecase } from '@src/usecases/course/lessons/list-lessons.usecase';
import { UpdateLessonUsecase } from '@src/usecases/course/lessons/update-lesson.usecase';
import { currentActor } from '../decorators/current-actor.decorator';
import { Public } from '../decorators/public.decorator';
import { toPageParams } from '../pagination.query';
import { parseIdPipe } from '../pipes/parse-id.pipe';
import { CreateLessonInput, ListLessonsQuery, UpdateLessonInput } from './dto/lesson.input';

@Controller('lessons')
@ValidateInput()
export class LessonController {
  constructor(
    private readonly listLessonsUsecase: ListLessonsUsecase,
    private readonly getLessonUsecase: GetLessonUsecase,
    private readonly createLessonUsecase: CreateLessonUsecase,
    private readonly updateLessonUsecase: UpdateLessonUsecase,
    private readonly deleteLessonUsecase: DeleteLessonUsecase,
  ) {}

  @Public()
  @Get()
  async list(
    @currentActor() actor: Actor,
    @Query() query: ListLessonsQuery,
  ): Promise<PageResult<LessonView>> {
    return this.listLessonsUsecase.execute(actor, {
      courseId: query.course,
      page: toPageParams(query),
    });
  }

  @Public()
  @Get(':id')
  async detail(
    @currentActor() actor: Actor,
    @Param('id', parseIdPipe()) id: number,
  ): Promise<LessonView> {
    return this.getLessonUsecase.execute(actor, id);
  }

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async create(
    @currentActor() actor: Actor,
    @Body() body: CreateLessonInput,
  ): Promise<LessonView> {
    return this.createLessonUsecase.execute(actor, {
      courseId: body.course,
      title: body.title,
      content: body.content,
      durationMin: body.duration_min,
      orderIndex: body.order_index,
    });
  }

  @Put(':id')
  async replace(
    @currentActor() actor: Actor,
    @Param('id', parseIdPipe()) id: number,
    @Body() body: UpdateLessonInput,
  ): Promise<LessonView> {
    return this.update(actor, id, body);
  }

  @Patch(':id')
  async patch(
    @currentActor() actor: Actor,
    @Param('id', parseIdPipe()) id: number,
    @Body() body: UpdateLessonInput,
  ): Promise<LessonView> {
    return this.update(actor, id, body);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(
    @currentActor() actor: Actor,
    @Param('id', parseIdPipe()) id: number,
  ): Promise<void> {
    await this.deleteLessonUsecase.execute(actor, id);
  }

  private update(actor: Actor, id: number, body: UpdateLessonInput): Promise<LessonView> {
    return this.updateLessonUsecase.execute(actor, id, {
      title: body.title,
      content: body.content,
      durationMin: body.duration_min,
      orderIndex: body.order_index,
    });
  }
}
