// src/core/common/errors/validation.formatter.ts

import { ValidationError } from 'class-validator';

/**
 * 格式化验证错误消息
 * 同一条消息只保留一次（嵌套数组中多个元素命中同一约束时）
 * @param errors 验证错误数组
 * @returns 以 `; ` 连接的错误消息
 */
export function formatValidationErrors(errors: ValidationError[]): string {
  return [...new Set(collectMessages(errors))].join('; ');
}

function collectMessages(errors: ValidationError[]): string[] {
  const messages: string[] = [];
  errors.forEach((error) => {
    if (error.constraints) {
      Object.values(error.constraints).forEach((message) => messages.push(message));
    }
    // 处理嵌套验证错误
    if (error.children && error.children.length > 0) {
      messages.push(...collectMessages(error.children));
    }
  });
  return messages;
}
