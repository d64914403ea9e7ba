// src/usecases/auth/request-password-reset.usecase.spec.ts
import { TokenHelper } from '@core/common/token/token.helper';
import { UserEntity } from '@modules/account/user.entity';
import { UserService } from '@modules/account/user.service';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { Test } from '@nestjs/testing';
import { MailService } from '@src/infrastructure/mail/mail.service';
import { PinoLogger } from 'nestjs-pino';
import {
  PASSWORD_RESET_REQUESTED_MESSAGE,
  RequestPasswordResetUsecase,
} from './request-password-reset.usecase';

describe('RequestPasswordResetUsecase', () => {
  const jwtService = new JwtService({ secret: 'test-secret' });
  const userService = { findActiveByEmail: jest.fn() };
  const mailService = {
    send: jest.fn<Promise<string>, [{ to: string; subject: string; text: string }]>(),
  };
  const logger = { setContext: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
  let usecase: RequestPasswordResetUsecase;

  const user = Object.assign(new UserEntity(), {
    id: 9,
    username: 'ravi',
    email: 'ravi@example.com',
    isActive: true,
    passwordHash: 'hash-v1',
  });

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        RequestPasswordResetUsecase,
        TokenHelper,
        { provide: JwtService, useValue: jwtService },
        { provide: UserService, useValue: userService },
        { provide: MailService, useValue: mailService },
        {
          provide: ConfigService,
          useValue: new ConfigService({ server: { frontendUrl: 'https://portal.example.com/' } }),
        },
        { provide: PinoLogger, useValue: logger },
      ],
    }).compile();
    usecase = moduleRef.get(RequestPasswordResetUsecase);
  });

  it('邮箱匹配启用账户时发送重置链接', async () => {
    userService.findActiveByEmail.mockResolvedValue(user);
    mailService.send.mockResolvedValue('sent');

    const result = await usecase.execute({ email: '  ravi@example.com ' });

    expect(result).toEqual({ detail: PASSWORD_RESET_REQUESTED_MESSAGE });
    expect(userService.findActiveByEmail).toHaveBeenCalledWith('ravi@example.com');
    expect(mailService.send).toHaveBeenCalledTimes(1);
    expect(mailService.send).toHaveBeenCalledWith(
      expect.objectContaining({ to: 'ravi@example.com', subject: 'Password Reset Request' }),
    );
  });

  it('链接中的令牌属于该账户且为重置类型', async () => {
    userService.findActiveByEmail.mockResolvedValue(user);
    mailService.send.mockResolvedValue('sent');

    await usecase.execute({ email: 'ravi@example.com' });

    const [mail] = mailService.send.mock.calls[0];
    const match = /https:\/\/portal\.example\.com\/reset-password\?token=(\S+)/.exec(mail.text);
    expect(match).not.toBeNull();
    const claims = jwtService.verify<{ sub: number; type: string }>(decodeURIComponent(match?.[1] ?? ''));
    expect(claims).toMatchObject({ sub: 9, type: 'password_reset' });
  });

  it('邮箱不存在时返回同一提示且不发邮件', async () => {
    userService.findActiveByEmail.mockResolvedValue(null);

    const result = await usecase.execute({ email: 'nobody@example.com' });

    expect(result).toEqual({ detail: 'If an account exists for this email, a reset link has been sent.' });
    expect(mailService.send).not.toHaveBeenCalled();
  });

  it('邮件发送失败仍返回同一提示并记录错误', async () => {
    userService.findActiveByEmail.mockResolvedValue(user);
    mailService.send.mockRejectedValue(new Error('smtp down'));

    const result = await usecase.execute({ email: 'ravi@example.com' });

    expect(result).toEqual({ detail: PASSWORD_RESET_REQUESTED_MESSAGE });
    expect(logger.error).toHaveBeenCalledWith({ userId: 9, error: 'smtp down' }, '重置密码邮件发送失败');
  });
});
