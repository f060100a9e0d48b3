// src/core/common/errors/validate-input.decorator.ts

import { UsePipes, ValidationPipe } from '@nestjs/common';
import { ValidationError } from 'class-validator';
import { DomainError, VALIDATION_ERROR } from './domain-error';
import { formatValidationErrors } from './validation.formatter';

/**
 * 请求体校验管道
 * 失败时抛出 VALIDATION_FAILED 领域错误，details 为字段映射
 */
export const createValidationPipe = (): ValidationPipe =>
  new ValidationPipe({
    whitelist: true, // 自动移除非装饰器属性（例如客户端传入的 owner）
    forbidNonWhitelisted: false,
    transform: true, // 自动转换类型
    disableErrorMessages: false,
    stopAtFirstError: true, // 每个字段只报第一条
    validationError: {
      target: false,
      value: false,
    },
    exceptionFactory: (errors: ValidationError[]) =>
      new DomainError(
        VALIDATION_ERROR.VALIDATION_FAILED,
        'Validation failed',
        formatValidationErrors(errors),
      ),
  });

/**
 * 输入验证装饰器
 * 为 controller 方法提供标准的输入验证
 */
// eslint-disable-next-line @typescript-eslint/naming-convention
export const ValidateInput = () => UsePipes(createValidationPipe());
