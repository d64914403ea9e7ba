// src/types/models/account.types.ts

/**
 * 系统内置访问角色
 * - ADMIN：超级管理员
 * - STAFF：员工（含超级管理员）
 * - STUDENT：非员工账户
 */
export enum AccessRole {
  ADMIN = 'ADMIN',
  STAFF = 'STAFF',
  STUDENT = 'STUDENT',
}

/**
 * 计算用户的访问组：superuser → ADMIN + STAFF；staff → STAFF；其余 → STUDENT
 * 只看 isSuperuser / isStaff，Role 记录仅作业务分类，不参与鉴权
 */
export function buildAccessGroup(user: { isSuperuser: boolean; isStaff: boolean }): string[] {
  if (user.isSuperuser) return [AccessRole.ADMIN, AccessRole.STAFF];
  if (user.isStaff) return [AccessRole.STAFF];
  return [AccessRole.STUDENT];
}
