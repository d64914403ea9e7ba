// src/core/common/password/password-policy.service.spec.ts
import { PasswordPolicyService } from './password-policy.service';

describe('PasswordPolicyService', () => {
  const service = new PasswordPolicyService();

  it('符合默认策略的密码通过', () => {
    expect(service.validatePassword('tailor#2024')).toEqual({ isValid: true, errors: [] });
  });

  it('空白密码直接拒绝', () => {
    expect(service.validatePassword('   ')).toEqual({
      isValid: false,
      errors: ['Password cannot be blank.'],
    });
  });

  it('首尾空格被拒绝', () => {
    expect(service.validatePassword(' tailor#2024').errors).toEqual([
      'Password cannot start or end with whitespace.',
    ]);
  });

  it('逐项列出缺失的字符类型与长度问题', () => {
    const result = service.validatePassword('ABC');

    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual([
      'Password must be at least 8 characters long.',
      'Password must contain at least one lowercase letter.',
      'Password must contain at least one digit.',
      'Password must contain at least one special character.',
    ]);
  });

  it('黑名单大小写不敏感', () => {
    expect(service.validatePassword('P@ssword1').errors).toEqual(['This password is too common.']);
  });

  it('可以通过 config 覆盖默认策略', () => {
    const result = service.validatePassword('tailoring', {
      requireNumbers: false,
      requireSpecialChars: false,
    });
    expect(result.isValid).toBe(true);
  });
});
