// src/modules/course/lessons/lesson.entity.ts
import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

/**
 * 课时实体
 * 对应数据库表：lessons
 * 同一课程内按 orderIndex 排序，orderIndex 相同按插入顺序（id）
 */
@Entity('lessons')
@Index('idx_lessons_course_order', ['courseId', 'orderIndex'])
export class LessonEntity {
  /** 主键 ID */
  @PrimaryGeneratedColumn({ type: 'int' })
  id!: number;

  /** 所属课程 ID（引用 courses.id，不建外键；删除课程时由服务层级联删除） */
  @Column({ name: 'course_id', type: 'int', nullable: false })
  courseId!: number;

  @Column({ name: 'title', type: 'varchar', length: 200, nullable: false })
  title!: string;

  @Column({ name: 'content', type: 'text', nullable: false, default: '' })
  content!: string;

  /** 时长（分钟，≥ 1） */
  @Column({ name: 'duration_min', type: 'int', nullable: false, default: 5 })
  durationMin!: number;

  /** 排序序号（≥ 1，允许重复） */
  @Column({ name: 'order_index', type: 'int', nullable: false, default: 1 })
  orderIndex!: number;
}
