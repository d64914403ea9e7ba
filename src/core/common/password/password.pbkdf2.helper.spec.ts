// src/core/common/password/password.pbkdf2.helper.spec.ts
import { pbkdf2Sync } from 'crypto';
import { PasswordPbkdf2Helper } from './password.pbkdf2.helper';

describe('PasswordPbkdf2Helper', () => {
  it('按 5000 次迭代 / 64 字节 / sha256 生成 hex 哈希', () => {
    const expected = pbkdf2Sync('test-password', 'test-salt', 5000, 64, 'sha256').toString('hex');

    const actual = PasswordPbkdf2Helper.hashPasswordWithCrypto('test-password', 'test-salt');

    expect(actual).toBe(expected);
    expect(actual).toHaveLength(128);
  });

  it('generateSalt 每次生成不同的 32 位 hex 盐', () => {
    const a = PasswordPbkdf2Helper.generateSalt();
    const b = PasswordPbkdf2Helper.generateSalt();

    expect(a).toMatch(/^[0-9a-f]{32}$/);
    expect(a).not.toBe(b);
  });

  describe('verifyPasswordWithCrypto', () => {
    const salt = 'test-salt';
    const stored = PasswordPbkdf2Helper.hashPasswordWithCrypto('Secret#123', salt);

    it('正确密码通过校验', () => {
      expect(PasswordPbkdf2Helper.verifyPasswordWithCrypto('Secret#123', salt, stored)).toBe(true);
    });

    it('错误密码被拒绝', () => {
      expect(PasswordPbkdf2Helper.verifyPasswordWithCrypto('Secret#124', salt, stored)).toBe(false);
    });

    it('存储值长度不一致时直接返回 false', () => {
      expect(PasswordPbkdf2Helper.verifyPasswordWithCrypto('Secret#123', salt, 'abcd')).toBe(false);
    });
  });
});
