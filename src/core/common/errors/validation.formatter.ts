// src/core/common/errors/validation.formatter.ts

import { ValidationError } from 'class-validator';
import type { FieldErrors } from '@app-types/errors/problem-details';

/**
 * 将 class-validator 错误整理为字段映射
 * 嵌套属性使用点号路径，例如 { 'profile.email': [...] }
 */
export function formatValidationErrors(errors: ValidationError[], parentPath = ''): FieldErrors {
  const result: Record<string, string[]> = {};

  errors.forEach((error) => {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    if (error.constraints) {
      const messages = Object.values(error.constraints);
      result[path] = [...(result[path] ?? []), ...messages];
    }

    // 处理嵌套验证错误
    if (error.children && error.children.length > 0) {
      const nested = formatValidationErrors(error.children, path);
      Object.entries(nested).forEach(([key, messages]) => {
        result[key] = [...(result[key] ?? []), ...messages];
      });
    }
  });

  return result;
}
