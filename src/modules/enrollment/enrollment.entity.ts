// src/modules/enrollment/enrollment.entity.ts
import { CreateDateColumn, Column, Entity, Index, PrimaryGeneratedColumn, Unique } from 'typeorm';

/**
 * 选课实体
 * 对应数据库表：enrollments
 * (student_id, course_id) 唯一约束由数据库保证，是并发重复选课的最终防线
 */
@Entity('enrollments')
@Unique('uk_enrollments_student_course', ['studentId', 'courseId'])
@Index('idx_enrollments_course', ['courseId'])
export class EnrollmentEntity {
  /** 主键 ID */
  @PrimaryGeneratedColumn({ type: 'int' })
  id!: number;

  /** 学生用户 ID（引用 users.id，不建外键） */
  @Column({ name: 'student_id', type: 'int', nullable: false })
  studentId!: number;

  /** 课程 ID（引用 courses.id，不建外键） */
  @Column({ name: 'course_id', type: 'int', nullable: false })
  courseId!: number;

  /** 选课时间 */
  @CreateDateColumn({ name: 'created_at', type: 'datetime' })
  createdAt!: Date;
}
