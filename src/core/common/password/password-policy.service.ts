// src/core/common/password/password-policy.service.ts

import { Injectable } from '@nestjs/common';
import { ACCOUNT_ERROR, DomainError } from '../errors/domain-error';
import weakPasswords from './weak-passwords.json';

/**
 * 密码策略配置
 */
export interface PasswordPolicyConfig {
  minLength: number;
  maxLength: number;
  requireLowercase: boolean;
  requireUppercase: boolean;
  requireNumbers: boolean;
  requireSpecialChars: boolean;
  /** 是否检查常见密码黑名单 */
  checkBlacklist: boolean;
}

/**
 * 密码校验结果
 */
export interface PasswordValidationResult {
  isValid: boolean;
  /** 面向调用方的错误信息列表 */
  errors: string[];
}

type CharTypeKey = 'requireLowercase' | 'requireUppercase' | 'requireNumbers' | 'requireSpecialChars';

const CHAR_TYPE_CHECKS: ReadonlyArray<{
  readonly regex: RegExp;
  readonly configKey: CharTypeKey;
  readonly errorMessage: string;
}> = [
  {
    regex: /[a-z]/,
    configKey: 'requireLowercase',
    errorMessage: 'Password must contain at least one lowercase letter.',
  },
  {
    regex: /[A-Z]/,
    configKey: 'requireUppercase',
    errorMessage: 'Password must contain at least one uppercase letter.',
  },
  {
    regex: /\d/,
    configKey: 'requireNumbers',
    errorMessage: 'Password must contain at least one digit.',
  },
  {
    regex: /[!@#$%^&*()_+\-=[\]{};':"\\|,.<>/?~`]/,
    configKey: 'requireSpecialChars',
    errorMessage: 'Password must contain at least one special character.',
  },
];

/**
 * 密码策略服务
 * 提供统一的密码复杂度校验
 */
@Injectable()
export class PasswordPolicyService {
  private readonly defaultConfig: PasswordPolicyConfig = {
    minLength: 8,
    maxLength: 128,
    requireLowercase: true,
    requireUppercase: false, // 不强制大写
    requireNumbers: true,
    requireSpecialChars: true,
    checkBlacklist: true,
  };

  private readonly blacklist: ReadonlySet<string> = new Set(
    weakPasswords.map((p) => p.toLowerCase()),
  );

  /**
   * 验证密码是否符合策略要求
   * @param password 待验证的密码
   * @param config 覆盖默认策略的配置
   */
  validatePassword(
    password: string,
    config: Partial<PasswordPolicyConfig> = {},
  ): PasswordValidationResult {
    if (!password || !password.trim()) {
      return { isValid: false, errors: ['Password cannot be blank.'] };
    }

    // NFKC 规范化处理，避免全角/兼容字符绕过
    const normalized = password.normalize('NFKC');
    if (normalized !== normalized.trim()) {
      return {
        isValid: false,
        errors: ['Password cannot start or end with whitespace.'],
      };
    }

    const finalConfig = { ...this.defaultConfig, ...config };
    const errors: string[] = [];

    if (normalized.length < finalConfig.minLength) {
      errors.push(`Password must be at least ${finalConfig.minLength} characters long.`);
    }
    if (normalized.length > finalConfig.maxLength) {
      errors.push(`Password cannot be longer than ${finalConfig.maxLength} characters.`);
    }

    for (const check of CHAR_TYPE_CHECKS) {
      if (finalConfig[check.configKey] && !check.regex.test(normalized)) {
        errors.push(check.errorMessage);
      }
    }

    if (finalConfig.checkBlacklist && this.blacklist.has(normalized.toLowerCase())) {
      errors.push('This password is too common.');
    }

    return { isValid: errors.length === 0, errors };
  }

  /** 校验失败时抛出 PASSWORD_POLICY_VIOLATION，消息为各条错误以空格拼接 */
  assertValid(password: string): void {
    const result = this.validatePassword(password);
    if (!result.isValid) {
      throw new DomainError(ACCOUNT_ERROR.PASSWORD_POLICY_VIOLATION, result.errors.join(' '), {
        errors: result.errors,
      });
    }
  }
}
