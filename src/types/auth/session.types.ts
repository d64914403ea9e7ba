// src/types/auth/session.types.ts
import { AccessRole } from '../models/account.types';
import { JwtPayload } from '../jwt.types';

/**
 * Usecase 层统一会话类型
 * 从 JWT 中抽取必要字段，避免在各 usecase 重复定义。
 */
export interface UsecaseSession {
  /** 当前用户 ID */
  accountId: number;
  /** 用户名，审计记录使用 */
  username: string;
  /**
   * 角色访问组（已规范化）
   * - 全部转为大写字符串，去除空值与重复项
   * - 与 `@Roles()` 使用的角色编码一致
   */
  roles: string[];
}

/**
 * 从 JWT Payload 映射到 UsecaseSession
 */
export function mapJwtToUsecaseSession(jwt: JwtPayload): UsecaseSession {
  return {
    accountId: jwt.sub,
    username: jwt.username,
    roles: normalizeAccessGroup(jwt.accessGroup),
  };
}

/** 是否具备某角色 */
export function hasRole(session: Pick<UsecaseSession, 'roles'>, role: AccessRole): boolean {
  return session.roles.includes(role);
}

/** 管理员（superuser） */
export function isAdminSession(session: Pick<UsecaseSession, 'roles'>): boolean {
  return hasRole(session, AccessRole.ADMIN);
}

/** 员工：staff 或 superuser */
export function isStaffSession(session: Pick<UsecaseSession, 'roles'>): boolean {
  return hasRole(session, AccessRole.STAFF) || hasRole(session, AccessRole.ADMIN);
}

/**
 * 将 JWT `accessGroup` 规范化为角色数组
 */
export function normalizeAccessGroup(accessGroup: unknown): string[] {
  if (!Array.isArray(accessGroup)) return [];

  const normalized: string[] = [];
  for (const role of accessGroup) {
    if (role == null) continue;
    const name = String(role).trim();
    if (!name) continue;
    normalized.push(name.toUpperCase());
  }

  return Array.from(new Set(normalized));
}
