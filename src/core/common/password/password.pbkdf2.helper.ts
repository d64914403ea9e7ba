// src/core/common/password/password.pbkdf2.helper.ts
import { pbkdf2Sync, randomBytes, timingSafeEqual } from 'crypto';

/**
 * PBKDF2 密码哈希工具类
 * 5000 次迭代，64 字节输出，SHA-256；每个用户独立随机盐
 */
export class PasswordPbkdf2Helper {
  /** 生成随机盐（hex，32 字符） */
  static generateSalt(): string {
    return randomBytes(16).toString('hex');
  }

  /**
   * 根据传入的密码和盐值生成哈希字符串
   * @param password - 用户的密码
   * @param salt - 用于加密的盐值
   * @returns 返回 hex 编码的哈希字符串
   */
  static hashPasswordWithCrypto(password: string, salt: string): string {
    return pbkdf2Sync(password, salt, 5000, 64, 'sha256').toString('hex');
  }

  /**
   * 验证密码是否正确
   * @param password - 待验证的密码
   * @param salt - 盐值
   * @param hashedPassword - 已存储的哈希密码
   */
  static verifyPasswordWithCrypto(password: string, salt: string, hashedPassword: string): boolean {
    const hash = Buffer.from(this.hashPasswordWithCrypto(password, salt), 'hex');
    const stored = Buffer.from(hashedPassword, 'hex');
    if (hash.length !== stored.length) return false;
    return timingSafeEqual(hash, stored);
  }
}
