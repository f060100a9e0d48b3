// src/modules/course/courses/course.entity.ts
import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
  ValueTransformer,
} from 'typeorm';

/**
 * decimal 列在 MySQL 下返回字符串、在 SQLite 下返回数字
 * 统一归一为两位小数的字符串
 */
export const priceTransformer: ValueTransformer = {
  to: (value: string | number | null | undefined) => value,
  from: (value: string | number | null) => (value === null ? null : Number(value).toFixed(2)),
};

/**
 * 课程实体
 * 对应数据库表：courses
 */
@Entity('courses')
@Index('idx_courses_owner', ['ownerId'])
@Index('idx_courses_published', ['isPublished'])
export class CourseEntity {
  /** 主键 ID */
  @PrimaryGeneratedColumn({ type: 'int' })
  id!: number;

  /** 标题（3..200 字符） */
  @Column({ name: 'title', type: 'varchar', length: 200, nullable: false })
  title!: string;

  /** 描述 */
  @Column({ name: 'description', type: 'text', nullable: false, default: '' })
  description!: string;

  /** 所有者用户 ID（引用 users.id，不建外键） */
  @Column({ name: 'owner_id', type: 'int', nullable: false })
  ownerId!: number;

  /** 价格（非负，两位小数） */
  @Column({
    name: 'price',
    type: 'decimal',
    precision: 10,
    scale: 2,
    nullable: false,
    default: 0,
    transformer: priceTransformer,
  })
  price!: string;

  /** 是否发布 */
  @Column({ name: 'is_published', type: 'boolean', nullable: false, default: false })
  isPublished!: boolean;

  /** 创建时间（不可变） */
  @CreateDateColumn({ name: 'created_at', type: 'datetime', update: false })
  createdAt!: Date;
}
