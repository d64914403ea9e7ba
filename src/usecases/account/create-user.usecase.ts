// src/usecases/account/create-user.usecase.ts
import { type UsecaseSession } from '@app-types/auth/session.types';
import { ACCOUNT_ERROR, DomainError } from '@core/common/errors/domain-error';
import { PasswordPolicyService } from '@core/common/password/password-policy.service';
import { RoleService } from '@modules/account/role.service';
import { UserEntity } from '@modules/account/user.entity';
import { CreateUserData, UserService } from '@modules/account/user.service';
import { Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';

/**
 * 管理员创建用户
 */
@Injectable()
export class CreateUserUsecase {
  constructor(
    private readonly userService: UserService,
    private readonly roleService: RoleService,
    private readonly passwordPolicy: PasswordPolicyService,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(CreateUserUsecase.name);
  }

  async execute(session: UsecaseSession, data: CreateUserData): Promise<UserEntity> {
    if (!data.password) {
      throw new DomainError(ACCOUNT_ERROR.PASSWORD_REQUIRED, 'Password is required.');
    }
    this.passwordPolicy.assertValid(data.password);
    if (data.roleId != null) await this.roleService.getOrThrow(data.roleId);

    const user = await this.userService.create(data, session.username);
    this.logger.info({ userId: user.id, by: session.accountId }, '用户已创建');
    // 回读以带上角色
    return this.userService.getOrThrow(user.id);
  }
}
