// src/usecases/auth/register-user.usecase.ts
import type { FieldErrors } from '@app-types/errors/problem-details';
import { UserRole, type UserProfileView } from '@app-types/models/user.types';
import { ACCOUNT_ERROR, DomainError, VALIDATION_ERROR } from '@core/common/errors/domain-error';
import { PasswordPolicyService } from '@core/common/password/password-policy.service';
import { PasswordPbkdf2Helper } from '@core/common/password/password.pbkdf2.helper';
import { UserEntity } from '@modules/user/user.entity';
import { UserService } from '@modules/user/user.service';
import { Injectable } from '@nestjs/common';
import { isUniqueViolation } from '@src/infrastructure/typeorm/unique-violation';
import { PinoLogger } from 'nestjs-pino';
import { toUserProfile } from './user-profile.mapper';

export type RegisterUserInput = {
  readonly username: string;
  readonly email: string;
  readonly password: string;
  /** 仅 student / instructor，由 DTO 限定 */
  readonly role?: UserRole.STUDENT | UserRole.INSTRUCTOR;
};

export const USERNAME_TAKEN_MESSAGE = 'A user with that username already exists.';
export const EMAIL_TAKEN_MESSAGE = 'This email is already registered.';

/**
 * 注册用例
 * 唯一性与密码策略的错误一次性汇总为字段错误映射
 */
@Injectable()
export class RegisterUserUsecase {
  constructor(
    private readonly userService: UserService,
    private readonly passwordPolicy: PasswordPolicyService,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(RegisterUserUsecase.name);
  }

  async execute(input: RegisterUserInput): Promise<UserProfileView> {
    const username = input.username.trim();
    const email = input.email.trim().toLowerCase();

    const errors: Record<string, string[]> = {};
    if (await this.userService.isUsernameTaken(username)) {
      errors.username = [USERNAME_TAKEN_MESSAGE];
    }
    if (await this.userService.isEmailTaken(email)) {
      errors.email = [EMAIL_TAKEN_MESSAGE];
    }
    const policy = this.passwordPolicy.validatePassword(input.password, { username, email });
    if (!policy.isValid) errors.password = policy.errors;

    if (Object.keys(errors).length > 0) {
      const details: FieldErrors = errors;
      throw new DomainError(VALIDATION_ERROR.VALIDATION_FAILED, 'Validation failed', details);
    }

    const salt = PasswordPbkdf2Helper.generateSalt();
    const user = await this.insert({
      username,
      email,
      passwordHash: PasswordPbkdf2Helper.hashPassword(input.password, salt),
      passwordSalt: salt,
      role: input.role ?? UserRole.STUDENT,
    });
    this.logger.info({ userId: user.id, role: user.role }, 'User registered');
    return toUserProfile(user);
  }

  /**
   * 预检查之后仍可能并发冲突：唯一约束冲突时重新判断是哪一列
   */
  private async insert(data: Parameters<UserService['create']>[0]): Promise<UserEntity> {
    try {
      return await this.userService.create(data);
    } catch (error) {
      if (!isUniqueViolation(error)) throw error;
      if (await this.userService.isUsernameTaken(data.username)) {
        throw new DomainError(
          ACCOUNT_ERROR.USERNAME_TAKEN,
          USERNAME_TAKEN_MESSAGE,
          { username: [USERNAME_TAKEN_MESSAGE] },
          error,
        );
      }
      throw new DomainError(
        ACCOUNT_ERROR.EMAIL_TAKEN,
        EMAIL_TAKEN_MESSAGE,
        { email: [EMAIL_TAKEN_MESSAGE] },
        error,
      );
    }
  }
}
