// src/adapters/http/courses/course.controller.ts
import type { Actor } from '@app-types/auth/session.types';
import type { PageResult } from '@app-types/common/pagination.types';
import { isCourseOrdering, type CourseView } from '@app-types/models/course.types';
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
  UseGuards,
} from '@nestjs/common';
import { CreateCourseUsecase } from '@src/usecases/course/courses/create-course.usecase';
import { DeleteCourseUsecase } from '@src/usecases/course/courses/delete-course.usecase';
import { GetCourseUsecase } from '@src/usecases/course/courses/get-course.usecase';
import { ListCoursesUsecase } from '@src/usecases/course/courses/list-courses.usecase';
import {
  UpdateCourseUsecase,
  type UpdateCourseInput,
} from '@src/usecases/course/courses/update-course.usecase';
import { CollectionAccess } from '../decorators/collection-access.decorator';
import { currentActor } from '../decorators/current-actor.decorator';
import { Public } from '../decorators/public.decorator';
import { CollectionAccessGuard } from '../guards/collection-access.guard';
import { toPageParams } from '../pagination.query';
import { parseIdPipe } from '../pipes/parse-id.pipe';
import { CreateCourseInput, ListCoursesQuery, PatchCourseInput } from './dto/course.input';

const toUpdateInput = (body: PatchCourseInput): UpdateCourseInput => ({
  title: body.title,
  description: body.description,
  price: body.price,
  isPublished: body.is_published,
});

/**
 * 课程 REST 控制器
 * 列表与详情对匿名开放；写操作需要登录，权限由用例层判定
 */
@Controller('courses')
@ValidateInput()
export class CourseController {
  constructor(
    private readonly listCoursesUsecase: ListCoursesUsecase,
    private readonly getCourseUsecase: GetCourseUsecase,
    private readonly createCourseUsecase: CreateCourseUsecase,
    private readonly updateCourseUsecase: UpdateCourseUsecase,
    private readonly deleteCourseUsecase: DeleteCourseUsecase,
  ) {}

  @Public()
  @Get()
  async list(
    @currentActor() actor: Actor,
    @Query() query: ListCoursesQuery,
  ): Promise<PageResult<CourseView>> {
    const search = query.search?.trim();
    return this.listCoursesUsecase.execute(actor, {
      search: search ? search : undefined,
      // 非法排序值忽略
      ordering: isCourseOrdering(query.ordering) ? query.ordering : undefined,
      page: toPageParams(query),
    });
  }

  @Public()
  @Get(':id')
  async detail(
    @currentActor() actor: Actor,
    @Param('id', parseIdPipe()) id: number,
  ): Promise<CourseView> {
    return this.getCourseUsecase.execute(actor, id);
  }

  @Post()
  @UseGuards(CollectionAccessGuard)
  @CollectionAccess('create', 'course-collection')
  @HttpCode(HttpStatus.CREATED)
  async create(
    @currentActor() actor: Actor,
    @Body() body: CreateCourseInput,
  ): Promise<CourseView> {
    return this.createCourseUsecase.execute(actor, {
      title: body.title,
      description: body.description,
      price: body.price,
      isPublished: body.is_published,
    });
  }

  @Put(':id')
  async replace(
    @currentActor() actor: Actor,
    @Param('id', parseIdPipe()) id: number,
    @Body() body: CreateCourseInput,
  ): Promise<CourseView> {
    return this.updateCourseUsecase.execute(actor, id, toUpdateInput(body));
  }

  @Patch(':id')
  async patch(
    @currentActor() actor: Actor,
    @Param('id', parseIdPipe()) id: number,
    @Body() body: PatchCourseInput,
  ): Promise<CourseView> {
    return this.updateCourseUsecase.execute(actor, id, toUpdateInput(body));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(
    @currentActor() actor: Actor,
    @Param('id', parseIdPipe()) id: number,
  ): Promise<void> {
    await this.deleteCourseUsecase.execute(actor, id);
  }
}
