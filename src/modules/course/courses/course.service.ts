// src/modules/course/courses/course.service.ts
import type { CourseView } from '@app-types/models/course.types';
import type { CourseListScope } from '@core/course/policy/course-access.policy';
import { EnrollmentEntity } from '@modules/enrollment/enrollment.entity';
import { UserEntity } from '@modules/user/user.entity';
import { Injectable } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, In, Repository } from 'typeorm';
import { LessonEntity } from '../lessons/lesson.entity';
import { CourseEntity } from './course.entity';

export type CreateCourseData = {
  readonly title: string;
  readonly description: string;
  readonly price: string;
  readonly isPublished: boolean;
  readonly ownerId: number;
};

export type UpdateCourseData = Partial<Omit<CreateCourseData, 'ownerId'>>;

/**
 * 课程服务
 * 负责课程持久化与读模型（CourseView）组装
 */
@Injectable()
export class CourseService {
  constructor(
    @InjectRepository(CourseEntity)
    private readonly courseRepository: Repository<CourseEntity>,
    @InjectDataSource()
    private readonly dataSource: DataSource,
  ) {}

  async findById(id: number): Promise<CourseEntity | null> {
    return await this.courseRepository.findOne({ where: { id } });
  }

  /**
   * 查询单个课程读模型（未按访问者裁剪）
   */
  async findViewById(id: number): Promise<CourseView | null> {
    const course = await this.findById(id);
    if (!course) return null;
    const [view] = await this.toViews([course]);
    return view ?? null;
  }

  /**
   * 查询全部课程读模型，按创建时间倒序（同一时间按 id 倒序）
   */
  async findAllViews(): Promise<CourseView[]> {
    const courses = await this.courseRepository.find({
      order: { createdAt: 'DESC', id: 'DESC' },
    });
    return await this.toViews(courses);
  }

  /**
   * 查询可见范围内的课程 ID（实时数据，不经缓存）
   */
  async findIdsInScope(scope: CourseListScope): Promise<number[]> {
    const qb = this.courseRepository.createQueryBuilder('c').select('c.id', 'id');
    // 布尔列在 MySQL / SQLite 下都以 0/1 存储，参数直接用数字
    if (scope.kind === 'published') {
      qb.where('c.isPublished = :published', { published: 1 });
    } else if (scope.kind === 'published-or-owned') {
      qb.where('(c.isPublished = :published OR c.ownerId = :ownerId)', {
        published: 1,
        ownerId: scope.ownerId,
      });
    }
    const rows = await qb.orderBy('c.id', 'ASC').getRawMany<{ id: number | string }>();
    return rows.map((r) => Number(r.id));
  }

  async count(): Promise<number> {
    return await this.courseRepository.count();
  }

  async create(data: CreateCourseData): Promise<CourseEntity> {
    const entity = this.courseRepository.create({
      title: data.title,
      description: data.description,
      price: data.price,
      isPublished: data.isPublished,
      ownerId: data.ownerId,
    });
    return await this.courseRepository.save(entity);
  }

  /**
   * 更新课程（ownerId 与 createdAt 不可修改）
   */
  async update(id: number, patch: UpdateCourseData): Promise<void> {
    const changes: Partial<CourseEntity> = {};
    if (patch.title !== undefined) changes.title = patch.title;
    if (patch.description !== undefined) changes.description = patch.description;
    if (patch.price !== undefined) changes.price = patch.price;
    if (patch.isPublished !== undefined) changes.isPublished = patch.isPublished;
    if (Object.keys(changes).length === 0) return;
    await this.courseRepository.update({ id }, changes);
  }

  /**
   * 删除课程，并在同一事务内删除其课时与选课记录
   */
  async deleteCascade(id: number): Promise<void> {
    await this.dataSource.transaction(async (manager) => {
      await manager.delete(LessonEntity, { courseId: id });
      await manager.delete(EnrollmentEntity, { courseId: id });
      await manager.delete(CourseEntity, { id });
    });
  }

  /**
   * 组装读模型：owner 用户名与课时数量各一次查询
   */
  private async toViews(courses: ReadonlyArray<CourseEntity>): Promise<CourseView[]> {
    if (courses.length === 0) return [];
    const courseIds = courses.map((c) => c.id);
    const ownerIds = [...new Set(courses.map((c) => c.ownerId))];

    const owners = await this.dataSource.getRepository(UserEntity).find({
      where: { id: In(ownerIds) },
      select: { id: true, username: true },
    });
    const ownerNames = new Map(owners.map((u) => [u.id, u.username]));

    const counts = await this.dataSource
      .getRepository(LessonEntity)
      .createQueryBuilder('l')
      .select('l.courseId', 'courseId')
      .addSelect('COUNT(l.id)', 'total')
      .where('l.courseId IN (:...courseIds)', { courseIds })
      .groupBy('l.courseId')
      .getRawMany<{ courseId: number | string; total: number | string }>();
    const lessonCounts = new Map(counts.map((r) => [Number(r.courseId), Number(r.total)]));

    return courses.map((course) => ({
      id: course.id,
      title: course.title,
      description: course.description,
      price: course.price,
      is_published: course.isPublished,
      owner: ownerNames.get(course.ownerId) ?? null,
      owner_id: course.ownerId,
      created_at: course.createdAt.toISOString(),
      lessons_count: lessonCounts.get(course.id) ?? 0,
    }));
  }
}
