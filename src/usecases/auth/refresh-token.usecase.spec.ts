// src/usecases/auth/refresh-token.usecase.spec.ts
import { AccessRole } from '@app-types/models/account.types';
import { AUTH_ERROR } from '@core/common/errors/domain-error';
import { resolveHttpStatus } from '@core/common/errors/error-status';
import { TokenHelper } from '@core/common/token/token.helper';
import { UserEntity } from '@modules/account/user.entity';
import { UserService } from '@modules/account/user.service';
import { HttpStatus } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { Test } from '@nestjs/testing';
import { PinoLogger } from 'nestjs-pino';
import { RefreshTokenUsecase } from './refresh-token.usecase';

describe('RefreshTokenUsecase', () => {
  const jwtService = new JwtService({ secret: 'test-secret' });
  const userService = { findById: jest.fn() };
  const logger = { setContext: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
  let usecase: RefreshTokenUsecase;
  let tokenHelper: TokenHelper;

  const staff = Object.assign(new UserEntity(), {
    id: 9,
    username: 'ravi',
    email: 'ravi@example.com',
    isActive: true,
    isStaff: true,
    isSuperuser: false,
  });

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        RefreshTokenUsecase,
        TokenHelper,
        { provide: JwtService, useValue: jwtService },
        { provide: UserService, useValue: userService },
        { provide: PinoLogger, useValue: logger },
      ],
    }).compile();
    usecase = moduleRef.get(RefreshTokenUsecase);
    tokenHelper = moduleRef.get(TokenHelper);
  });

  it('刷新令牌换取带访问组的 access 令牌', async () => {
    userService.findById.mockResolvedValue(staff);
    const refresh = tokenHelper.generateRefreshToken({ payload: { sub: 9 } });

    const { access } = await usecase.execute({ refresh });

    expect(userService.findById).toHaveBeenCalledWith(9);
    expect(jwtService.verify<Record<string, unknown>>(access)).toMatchObject({
      sub: 9,
      username: 'ravi',
      email: 'ravi@example.com',
      accessGroup: [AccessRole.STAFF],
      type: 'access',
    });
  });

  it('访问组不受 Role 记录名称影响', async () => {
    userService.findById.mockResolvedValue({ ...staff, role: { id: 3, name: 'Admin' } });
    const refresh = tokenHelper.generateRefreshToken({ payload: { sub: 9 } });

    const { access } = await usecase.execute({ refresh });

    expect(jwtService.verify<Record<string, unknown>>(access)).toMatchObject({ accessGroup: [AccessRole.STAFF] });
  });

  it('access 令牌不能用于刷新', async () => {
    const access = tokenHelper.generateAccessToken({
      payload: tokenHelper.createPayloadFromUser({
        id: 9,
        username: 'ravi',
        email: null,
        accessGroup: [AccessRole.STAFF],
      }),
    });

    await expect(usecase.execute({ refresh: access })).rejects.toMatchObject({
      code: AUTH_ERROR.INVALID_REFRESH_TOKEN,
      message: 'Token is invalid or expired',
      details: { reason: 'type', type: 'access' },
    });
    expect(userService.findById).not.toHaveBeenCalled();
    expect(resolveHttpStatus(AUTH_ERROR.INVALID_REFRESH_TOKEN)).toBe(HttpStatus.UNAUTHORIZED);
  });

  it('账户已停用时拒绝刷新', async () => {
    userService.findById.mockResolvedValue({ ...staff, isActive: false });
    const refresh = tokenHelper.generateRefreshToken({ payload: { sub: 9 } });

    await expect(usecase.execute({ refresh })).rejects.toMatchObject({
      code: AUTH_ERROR.INVALID_REFRESH_TOKEN,
      details: { reason: 'user', userId: 9 },
    });
  });

  it('账户不存在时拒绝刷新', async () => {
    userService.findById.mockResolvedValue(null);
    const refresh = tokenHelper.generateRefreshToken({ payload: { sub: 9 } });

    await expect(usecase.execute({ refresh })).rejects.toMatchObject({
      code: AUTH_ERROR.INVALID_REFRESH_TOKEN,
      details: { reason: 'user', userId: 9 },
    });
  });

  it('签名不符的令牌统一报刷新令牌无效', async () => {
    const forged = new JwtService({ secret: 'other-secret' }).sign({ sub: 9, type: 'refresh' });

    await expect(usecase.execute({ refresh: forged })).rejects.toMatchObject({
      code: AUTH_ERROR.INVALID_REFRESH_TOKEN,
      message: 'Token is invalid or expired',
    });
    expect(userService.findById).not.toHaveBeenCalled();
  });
});
