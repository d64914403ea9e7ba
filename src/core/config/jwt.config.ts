// src/core/config/jwt.config.ts

import { registerAs } from '@nestjs/config';

export default registerAs('jwt', () => ({
  // 用于签名 JWT 的密钥（生产环境必须通过环境变量覆盖）
  secret: process.env.JWT_SECRET || 'dev-only-jwt-secret',

  // Access Token 有效期（分钟）
  expiresIn: `${parseInt(process.env.JWT_ACCESS_MIN || '60', 10)}m`,

  // Refresh Token 有效期（天）
  refreshExpiresIn: `${parseInt(process.env.JWT_REFRESH_DAYS || '7', 10)}d`,

  // 重置密码链接的有效期
  passwordResetExpiresIn: process.env.JWT_PASSWORD_RESET_EXPIRES_IN || '30m',

  algorithm: process.env.JWT_ALGORITHM || 'HS256',

  // 允许的 issuer、audience 等（更严格控制）
  issuer: process.env.JWT_ISSUER || 'institute-api',
  audience: process.env.JWT_AUDIENCE || 'institute-web',
}));
