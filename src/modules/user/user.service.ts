// src/modules/user/user.service.ts
import { UserRole } from '@app-types/models/user.types';
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { UserEntity } from './user.entity';

/**
 * 用户服务
 * 提供用户的基础读写能力；唯一性校验与密码处理由 usecase 编排
 */
@Injectable()
export class UserService {
  constructor(
    @InjectRepository(UserEntity)
    private readonly userRepository: Repository<UserEntity>,
  ) {}

  async findById(id: number): Promise<UserEntity | null> {
    return await this.userRepository.findOne({ where: { id } });
  }

  async findByUsername(username: string): Promise<UserEntity | null> {
    return await this.userRepository.findOne({ where: { username: username.trim() } });
  }

  async isUsernameTaken(username: string): Promise<boolean> {
    return await this.userRepository.exists({ where: { username: username.trim() } });
  }

  /**
   * 邮箱比较大小写不敏感（入库时已统一小写）
   */
  async isEmailTaken(email: string): Promise<boolean> {
    return await this.userRepository.exists({ where: { email: email.trim().toLowerCase() } });
  }

  /**
   * 创建用户
   * @param data 已完成校验与哈希的数据
   */
  async create(data: {
    readonly username: string;
    readonly email: string;
    readonly passwordHash: string;
    readonly passwordSalt: string;
    readonly role: UserRole;
  }): Promise<UserEntity> {
    const entity = this.userRepository.create({
      username: data.username.trim(),
      email: data.email.trim().toLowerCase(),
      passwordHash: data.passwordHash,
      passwordSalt: data.passwordSalt,
      role: data.role,
    });
    return await this.userRepository.save(entity);
  }

  /**
   * 修改角色（运维操作；不会回收已拥有的课程）
   */
  async updateRole(id: number, role: UserRole): Promise<void> {
    await this.userRepository.update({ id }, { role });
  }
}
