// src/modules/user/user.entity.ts
import { UserRole } from '@app-types/models/user.types';
import { Column, CreateDateColumn, Entity, PrimaryGeneratedColumn, Unique } from 'typeorm';

/**
 * 用户实体
 * 对应数据库表：users
 */
@Entity('users')
@Unique('uk_users_username', ['username'])
@Unique('uk_users_email', ['email'])
export class UserEntity {
  /** 主键 ID */
  @PrimaryGeneratedColumn({ type: 'int' })
  id!: number;

  /** 用户名（去除首尾空白后保存） */
  @Column({ name: 'username', type: 'varchar', length: 150, nullable: false })
  username!: string;

  /** 邮箱（统一小写保存，比较时大小写不敏感） */
  @Column({ name: 'email', type: 'varchar', length: 254, nullable: false })
  email!: string;

  /** 密码哈希（pbkdf2） */
  @Column({ name: 'password_hash', type: 'varchar', length: 255, nullable: false })
  passwordHash!: string;

  /** 密码盐 */
  @Column({ name: 'password_salt', type: 'varchar', length: 64, nullable: false })
  passwordSalt!: string;

  /** 角色：admin / instructor / student */
  @Column({
    name: 'role',
    type: 'varchar',
    length: 20,
    nullable: false,
    default: UserRole.STUDENT,
  })
  role!: UserRole;

  /** 注册时间 */
  @CreateDateColumn({ name: 'date_joined', type: 'datetime' })
  dateJoined!: Date;
}
