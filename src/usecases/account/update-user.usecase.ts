// src/usecases/account/update-user.usecase.ts
import { type UsecaseSession, isAdminSession } from '@app-types/auth/session.types';
import { DomainError, PERMISSION_ERROR } from '@core/common/errors/domain-error';
import { PasswordPolicyService } from '@core/common/password/password-policy.service';
import { RoleService } from '@modules/account/role.service';
import { UserEntity } from '@modules/account/user.entity';
import { UpdateUserData, UserService } from '@modules/account/user.service';
import { Injectable } from '@nestjs/common';

/** 仅管理员可修改的字段 */
const ADMIN_ONLY_FIELDS = ['isActive', 'isStaff', 'isSuperuser', 'roleId'] as const;

/**
 * 更新用户：本人或管理员
 * 非管理员提交的授权字段直接忽略
 */
@Injectable()
export class UpdateUserUsecase {
  constructor(
    private readonly userService: UserService,
    private readonly roleService: RoleService,
    private readonly passwordPolicy: PasswordPolicyService,
  ) {}

  async execute(
    session: UsecaseSession,
    targetId: number,
    patch: UpdateUserData,
  ): Promise<UserEntity> {
    const isAdmin = isAdminSession(session);
    if (!isAdmin && session.accountId !== targetId) {
      throw new DomainError(
        PERMISSION_ERROR.ACCESS_DENIED,
        'You do not have permission to perform this action.',
      );
    }

    const sanitized: UpdateUserData = isAdmin ? patch : stripAdminFields(patch);
    if (sanitized.password !== undefined) this.passwordPolicy.assertValid(sanitized.password);
    if (sanitized.roleId != null) await this.roleService.getOrThrow(sanitized.roleId);

    await this.userService.update(targetId, sanitized, session.username);
    return this.userService.getOrThrow(targetId);
  }
}

function stripAdminFields(patch: UpdateUserData): UpdateUserData {
  const next: { -readonly [K in keyof UpdateUserData]: UpdateUserData[K] } = { ...patch };
  for (const field of ADMIN_ONLY_FIELDS) delete next[field];
  return next;
}
