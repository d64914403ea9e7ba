// src/core/common/errors/validation.pipe.ts

import { BadRequestException, ValidationPipe } from '@nestjs/common';
import { ValidationError } from 'class-validator';
import { formatValidationErrors } from './validation.formatter';

/**
 * 全局 DTO 校验管道（main.ts 注册）
 * 校验失败统一返回 400，消息按字段拼接
 */
export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true, // 自动移除非装饰器属性
    forbidNonWhitelisted: true, // 当遇到非白名单属性时抛出错误
    transform: true, // 自动转换类型
    disableErrorMessages: false,
    stopAtFirstError: false,
    validationError: {
      target: false,
      value: false,
    },
    exceptionFactory: (errors: ValidationError[]) => {
      const message = formatValidationErrors(errors);
      return new BadRequestException(message);
    },
  });
}
