// src/adapters/api/account/account.presenter.ts
import type { RoleEntity } from '@modules/account/role.entity';
import type { UserEntity } from '@modules/account/user.entity';

/** 对外用户视图：不含密码哈希与盐 */
export interface UserView {
  readonly id: number;
  readonly username: string;
  readonly email: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly phone: string;
  readonly address: string | null;
  readonly roleId: number | null;
  readonly roleName: string | null;
  readonly isActive: boolean;
  readonly isStaff: boolean;
  readonly isSuperuser: boolean;
  readonly dateJoined: Date;
  readonly lastLogin: Date | null;
}

export function toUserView(user: UserEntity): UserView {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    firstName: user.firstName,
    lastName: user.lastName,
    phone: user.phone,
    address: user.address,
    roleId: user.roleId,
    roleName: user.role?.name ?? null,
    isActive: user.isActive,
    isStaff: user.isStaff,
    isSuperuser: user.isSuperuser,
    dateJoined: user.dateJoined,
    lastLogin: user.lastLogin,
  };
}

export interface RoleView {
  readonly id: number;
  readonly name: string;
  readonly description: string | null;
}

export function toRoleView(role: RoleEntity): RoleView {
  return { id: role.id, name: role.name, description: role.description };
}
