// src/usecases/auth/login.usecase.spec.ts
import { AUTH_ERROR } from '@core/common/errors/domain-error';
import { TokenHelper } from '@core/common/token/token.helper';
import { RoleEntity } from '@modules/account/role.entity';
import { UserEntity } from '@modules/account/user.entity';
import { UserService } from '@modules/account/user.service';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { Test } from '@nestjs/testing';
import { PinoLogger } from 'nestjs-pino';
import { INVALID_CREDENTIALS_MESSAGE, LoginUsecase } from './login.usecase';

describe('LoginUsecase', () => {
  const jwtService = new JwtService({ secret: 'test-secret', signOptions: { expiresIn: '60m' } });
  const userService = {
    findByUsername: jest.fn(),
    verifyPassword: jest.fn(),
    touchLastLogin: jest.fn(),
  };
  const logger = { setContext: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
  let usecase: LoginUsecase;

  const makeUser = (patch: Partial<UserEntity> = {}): UserEntity =>
    Object.assign(new UserEntity(), {
      id: 5,
      username: 'asha',
      email: 'asha@example.com',
      isActive: true,
      isStaff: true,
      isSuperuser: false,
      role: Object.assign(new RoleEntity(), { id: 2, name: 'Trainer' }),
      ...patch,
    });

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        LoginUsecase,
        TokenHelper,
        { provide: JwtService, useValue: jwtService },
        { provide: UserService, useValue: userService },
        { provide: PinoLogger, useValue: logger },
        { provide: ConfigService, useValue: new ConfigService({ jwt: { refreshExpiresIn: '7d' } }) },
      ],
    }).compile();
    usecase = moduleRef.get(LoginUsecase);
  });

  it('用户不存在时返回统一的凭据错误', async () => {
    userService.findByUsername.mockResolvedValue(null);

    await expect(usecase.execute({ username: 'nobody', password: 'x' })).rejects.toMatchObject({
      code: AUTH_ERROR.INVALID_CREDENTIALS,
      message: INVALID_CREDENTIALS_MESSAGE,
    });
  });

  it('停用账户即使密码正确也拒绝登录', async () => {
    userService.findByUsername.mockResolvedValue(makeUser({ isActive: false }));
    userService.verifyPassword.mockReturnValue(true);

    await expect(usecase.execute({ username: 'asha', password: 'right' })).rejects.toMatchObject({
      code: AUTH_ERROR.INVALID_CREDENTIALS,
    });
    expect(userService.touchLastLogin).not.toHaveBeenCalled();
  });

  it('登录成功签发 access 与 refresh 并记录登录时间', async () => {
    const user = makeUser();
    userService.findByUsername.mockResolvedValue(user);
    userService.verifyPassword.mockReturnValue(true);
    userService.touchLastLogin.mockResolvedValue(undefined);

    const result = await usecase.execute({ username: ' asha ', password: 'right' });

    expect(userService.findByUsername).toHaveBeenCalledWith('asha');
    expect(userService.touchLastLogin).toHaveBeenCalledWith(user);
    expect(result.user).toBe(user);

    const access = jwtService.verify<{ sub: number; type: string; accessGroup: string[] }>(result.access);
    expect(access.sub).toBe(5);
    expect(access.type).toBe('access');
    expect(access.accessGroup).toEqual(['STAFF', 'TRAINER']);

    const refresh = jwtService.verify<{ sub: number; type: string; exp: number; iat: number }>(
      result.refresh,
    );
    expect(refresh.type).toBe('refresh');
    expect(refresh.exp - refresh.iat).toBe(7 * 24 * 60 * 60);
  });
});
