// src/usecases/account/update-user.usecase.spec.ts
import { type UsecaseSession } from '@app-types/auth/session.types';
import { ACCOUNT_ERROR, PERMISSION_ERROR } from '@core/common/errors/domain-error';
import { PasswordPolicyService } from '@core/common/password/password-policy.service';
import { RoleService } from '@modules/account/role.service';
import { UserEntity } from '@modules/account/user.entity';
import { UserService } from '@modules/account/user.service';
import { Test } from '@nestjs/testing';
import { UpdateUserUsecase } from './update-user.usecase';

describe('UpdateUserUsecase', () => {
  const userService = { update: jest.fn(), getOrThrow: jest.fn() };
  const roleService = { getOrThrow: jest.fn() };
  let usecase: UpdateUserUsecase;

  const self: UsecaseSession = { accountId: 7, username: 'meena', roles: ['STUDENT'] };
  const admin: UsecaseSession = { accountId: 1, username: 'admin', roles: ['ADMIN', 'STAFF'] };

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        UpdateUserUsecase,
        PasswordPolicyService,
        { provide: UserService, useValue: userService },
        { provide: RoleService, useValue: roleService },
      ],
    }).compile();
    usecase = moduleRef.get(UpdateUserUsecase);
    userService.getOrThrow.mockResolvedValue(Object.assign(new UserEntity(), { id: 7 }));
  });

  it('非本人且非管理员时拒绝', async () => {
    await expect(usecase.execute(self, 8, { firstName: 'X' })).rejects.toMatchObject({
      code: PERMISSION_ERROR.ACCESS_DENIED,
    });
    expect(userService.update).not.toHaveBeenCalled();
  });

  it('本人修改时忽略授权字段', async () => {
    await usecase.execute(self, 7, { firstName: 'Meena', isStaff: true, roleId: 3, isActive: false });

    expect(userService.update).toHaveBeenCalledWith(7, { firstName: 'Meena' }, 'meena');
    expect(roleService.getOrThrow).not.toHaveBeenCalled();
  });

  it('管理员可修改授权字段并校验角色存在', async () => {
    roleService.getOrThrow.mockResolvedValue({ id: 3, name: 'Trainer' });

    await usecase.execute(admin, 7, { isStaff: true, roleId: 3 });

    expect(roleService.getOrThrow).toHaveBeenCalledWith(3);
    expect(userService.update).toHaveBeenCalledWith(7, { isStaff: true, roleId: 3 }, 'admin');
  });

  it('新密码不符合策略时拒绝', async () => {
    await expect(usecase.execute(self, 7, { password: 'abcdefgh' })).rejects.toMatchObject({
      code: ACCOUNT_ERROR.PASSWORD_POLICY_VIOLATION,
      message:
        'Password must contain at least one digit. Password must contain at least one special character.',
    });
  });
});
