// src/core/common/password/password.module.ts

import { Module } from '@nestjs/common';
import { PasswordPolicyService } from './password-policy.service';

/**
 * 注册时的密码强度校验；哈希由 PasswordPbkdf2Helper 静态方法完成，无需注入
 */
@Module({
  providers: [PasswordPolicyService],
  exports: [PasswordPolicyService],
})
export class PasswordModule {}
