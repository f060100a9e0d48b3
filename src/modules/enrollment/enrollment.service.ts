// src/modules/enrollment/enrollment.service.ts
import type { PageParams } from '@app-types/common/pagination.types';
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, In, Repository } from 'typeorm';
import { EnrollmentEntity } from './enrollment.entity';

/**
 * 选课服务
 * create 不做去重：唯一约束冲突原样抛出，由 usecase 转换为领域错误
 */
@Injectable()
export class EnrollmentService {
  constructor(
    @InjectRepository(EnrollmentEntity)
    private readonly enrollmentRepository: Repository<EnrollmentEntity>,
  ) {}

  async findById(id: number): Promise<EnrollmentEntity | null> {
    return await this.enrollmentRepository.findOne({ where: { id } });
  }

  /**
   * 按复合唯一键查询（studentId + courseId）
   */
  async findByUnique(params: {
    readonly studentId: number;
    readonly courseId: number;
  }): Promise<EnrollmentEntity | null> {
    return await this.enrollmentRepository.findOne({
      where: { studentId: params.studentId, courseId: params.courseId },
    });
  }

  /**
   * 插入选课记录
   * 使用单条 INSERT 而非 save()，不开启事务，唯一约束冲突直接抛出 QueryFailedError
   */
  async create(data: {
    readonly studentId: number;
    readonly courseId: number;
  }): Promise<EnrollmentEntity> {
    await this.enrollmentRepository.insert({
      studentId: data.studentId,
      courseId: data.courseId,
    });
    return await this.enrollmentRepository.findOneOrFail({
      where: { studentId: data.studentId, courseId: data.courseId },
    });
  }

  /**
   * 分页查询，按 id 升序
   * @param params 过滤条件（studentId / courseId 可选）与分页参数
   */
  async findPage(params: {
    readonly studentId?: number;
    readonly courseId?: number;
    readonly page: PageParams;
  }): Promise<{ readonly items: EnrollmentEntity[]; readonly total: number }> {
    const where: FindOptionsWhere<EnrollmentEntity> = {};
    if (params.studentId !== undefined) where.studentId = params.studentId;
    if (params.courseId !== undefined) where.courseId = params.courseId;
    const [items, total] = await this.enrollmentRepository.findAndCount({
      where,
      order: { id: 'ASC' },
      skip: (params.page.page - 1) * params.page.pageSize,
      take: params.page.pageSize,
    });
    return { items, total };
  }

  async delete(id: number): Promise<void> {
    await this.enrollmentRepository.delete({ id });
  }

  async count(): Promise<number> {
    return await this.enrollmentRepository.count();
  }

  /**
   * 删除悬空选课：所属课程或学生已不存在的记录（表间不建外键，需要定期清理）
   * @returns 删除的行数
   */
  async deleteAbandoned(): Promise<number> {
    const rows = await this.enrollmentRepository
      .createQueryBuilder('e')
      .select('e.id', 'id')
      .where('e.courseId NOT IN (SELECT c.id FROM courses c)')
      .orWhere('e.studentId NOT IN (SELECT u.id FROM users u)')
      .getRawMany<{ id: number | string }>();
    const ids = rows.map((r) => Number(r.id));
    if (ids.length === 0) return 0;
    await this.enrollmentRepository.delete({ id: In(ids) });
    return ids.length;
  }
}
