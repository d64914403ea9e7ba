// src/types/jwt.types.ts

/**
 * Token 类型
 * - access：访问令牌
 * - refresh：刷新令牌
 * - password_reset：重置密码令牌（绑定当前密码哈希指纹）
 */
export type JwtTokenType = 'access' | 'refresh' | 'password_reset';

/**
 * 生成访问令牌的参数类型
 */
export type GenerateAccessTokenParams = {
  payload: JwtPayload;
  expiresIn?: string;
};

/**
 * 生成刷新令牌的参数类型
 */
export type GenerateRefreshTokenParams = {
  payload: Pick<JwtPayload, 'sub'>;
  tokenVersion?: number;
  expiresIn?: string;
};

/**
 * 生成重置密码令牌的参数类型
 */
export type GeneratePasswordResetTokenParams = {
  userId: number;
  passwordHash: string;
};

/**
 * JWT Payload 类型定义
 */
export type JwtPayload = {
  sub: number; // 用户 ID
  username: string;
  email: string | null;
  accessGroup: string[]; // 角色编码，如 ADMIN / STAFF / STUDENT
  type?: JwtTokenType;
  tokenVersion?: number;
  pwd?: string; // 密码哈希指纹，仅 password_reset 使用
  iat?: number;
  exp?: number;
  iss?: string;
  aud?: string;
};
