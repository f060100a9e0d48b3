// src/modules/course/lessons/lesson.service.ts
import type { PageParams } from '@app-types/common/pagination.types';
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { LessonEntity } from './lesson.entity';

export type CreateLessonData = {
  readonly courseId: number;
  readonly title: string;
  readonly content: string;
  readonly durationMin: number;
  readonly orderIndex: number;
};

export type UpdateLessonData = Partial<Omit<CreateLessonData, 'courseId'>>;

/**
 * 课时服务
 */
@Injectable()
export class LessonService {
  constructor(
    @InjectRepository(LessonEntity)
    private readonly lessonRepository: Repository<LessonEntity>,
  ) {}

  async findById(id: number): Promise<LessonEntity | null> {
    return await this.lessonRepository.findOne({ where: { id } });
  }

  /**
   * 分页查询指定课程集合下的课时，按 courseId、orderIndex、id 升序
   * @param params 课程 ID 集合（空集合直接返回空页）与分页参数
   */
  async findPage(params: {
    readonly courseIds: ReadonlyArray<number>;
    readonly page: PageParams;
  }): Promise<{ readonly items: LessonEntity[]; readonly total: number }> {
    if (params.courseIds.length === 0) return { items: [], total: 0 };
    const [items, total] = await this.lessonRepository.findAndCount({
      where: { courseId: In([...params.courseIds]) },
      order: { courseId: 'ASC', orderIndex: 'ASC', id: 'ASC' },
      skip: (params.page.page - 1) * params.page.pageSize,
      take: params.page.pageSize,
    });
    return { items, total };
  }

  async create(data: CreateLessonData): Promise<LessonEntity> {
    const entity = this.lessonRepository.create({ ...data });
    return await this.lessonRepository.save(entity);
  }

  /**
   * 更新课时（不允许迁移到其他课程）
   */
  async update(id: number, patch: UpdateLessonData): Promise<void> {
    const changes: Partial<LessonEntity> = {};
    if (patch.title !== undefined) changes.title = patch.title;
    if (patch.content !== undefined) changes.content = patch.content;
    if (patch.durationMin !== undefined) changes.durationMin = patch.durationMin;
    if (patch.orderIndex !== undefined) changes.orderIndex = patch.orderIndex;
    if (Object.keys(changes).length === 0) return;
    await this.lessonRepository.update({ id }, changes);
  }

  async delete(id: number): Promise<void> {
    await this.lessonRepository.delete({ id });
  }
}
