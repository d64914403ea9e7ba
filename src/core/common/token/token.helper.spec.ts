// src/core/common/token/token.helper.spec.ts

import { GenerateAccessTokenParams, JwtPayload } from '@app-types/jwt.types';
import { JsonWebTokenError, JwtService, NotBeforeError, TokenExpiredError } from '@nestjs/jwt';
import { Test, TestingModule } from '@nestjs/testing';
import { createHash } from 'crypto';
import { PinoLogger } from 'nestjs-pino';
import { JWT_ERROR } from '../errors/domain-error';
import { fingerprintPasswordHash, TokenHelper } from './token.helper';

describe('TokenHelper', () => {
  let tokenHelper: TokenHelper;
  let jwtService: jest.Mocked<Pick<JwtService, 'sign' | 'verify'>>;
  let logger: jest.Mocked<Pick<PinoLogger, 'setContext' | 'error' | 'info' | 'warn' | 'debug'>>;

  const mockJwtPayload: JwtPayload = {
    sub: 1,
    username: 'asha',
    email: 'asha@example.com',
    accessGroup: ['STAFF'],
    type: 'access',
  };

  const mockToken =
    'eyJhbGciOiJIUzI1NiIsInR5cCI6IkpXVCJ9.eyJzdWIiOjEsInVzZXJuYW1lIjoiYXNoYSJ9.test';

  beforeEach(async () => {
    jwtService = {
      sign: jest.fn(),
      verify: jest.fn(),
    };
    logger = {
      setContext: jest.fn(),
      error: jest.fn(),
      info: jest.fn(),
      warn: jest.fn(),
      debug: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TokenHelper,
        { provide: JwtService, useValue: jwtService },
        { provide: PinoLogger, useValue: logger },
      ],
    }).compile();

    tokenHelper = module.get<TokenHelper>(TokenHelper);
  });

  it('初始化时设置 logger 上下文', () => {
    expect(logger.setContext).toHaveBeenCalledWith('TokenHelper');
  });

  describe('generateAccessToken', () => {
    it('签发 access token 并强制 type=access', () => {
      jwtService.sign.mockReturnValue(mockToken);
      const params: GenerateAccessTokenParams = { payload: { ...mockJwtPayload, type: undefined } };

      const result = tokenHelper.generateAccessToken(params);

      expect(jwtService.sign).toHaveBeenCalledWith({ ...mockJwtPayload, type: 'access' }, {});
      expect(result).toBe(mockToken);
    });

    it('支持自定义过期时间', () => {
      jwtService.sign.mockReturnValue(mockToken);

      tokenHelper.generateAccessToken({ payload: mockJwtPayload, expiresIn: '2h' });

      expect(jwtService.sign).toHaveBeenCalledWith(
        { ...mockJwtPayload, type: 'access' },
        { expiresIn: '2h' },
      );
    });

    it('签名失败时记录错误并抛出领域错误', () => {
      jwtService.sign.mockImplementation(() => {
        throw new Error('签名失败');
      });

      expect(() => tokenHelper.generateAccessToken({ payload: mockJwtPayload })).toThrow(
        'Failed to generate access token: 签名失败',
      );
      expect(logger.error).toHaveBeenCalledWith(
        { userId: 1, tokenType: 'access', error: '签名失败' },
        '令牌签发失败',
      );
    });
  });

  describe('generateRefreshToken', () => {
    it('默认 tokenVersion 为 1', () => {
      jwtService.sign.mockReturnValue(mockToken);

      const result = tokenHelper.generateRefreshToken({ payload: { sub: 7 } });

      expect(jwtService.sign).toHaveBeenCalledWith({ sub: 7, type: 'refresh', tokenVersion: 1 }, {});
      expect(result).toBe(mockToken);
    });

    it('可单独指定刷新令牌有效期', () => {
      jwtService.sign.mockReturnValue(mockToken);

      tokenHelper.generateRefreshToken({ payload: { sub: 7 }, expiresIn: '7d' });

      expect(jwtService.sign).toHaveBeenCalledWith(
        { sub: 7, type: 'refresh', tokenVersion: 1 },
        { expiresIn: '7d' },
      );
    });

    it('签名失败时抛出 REFRESH_TOKEN_GENERATION_FAILED', () => {
      jwtService.sign.mockImplementation(() => {
        throw new Error('boom');
      });

      expect(() => tokenHelper.generateRefreshToken({ payload: { sub: 7 } })).toThrow(
        expect.objectContaining({ code: JWT_ERROR.REFRESH_TOKEN_GENERATION_FAILED }),
      );
    });
  });

  describe('generatePasswordResetToken', () => {
    it('载荷只携带密码哈希指纹', () => {
      jwtService.sign.mockReturnValue('reset-token');

      const result = tokenHelper.generatePasswordResetToken({
        userId: 3,
        passwordHash: 'stored-hash',
      });

      expect(result).toBe('reset-token');
      expect(jwtService.sign).toHaveBeenCalledWith(
        { sub: 3, type: 'password_reset', pwd: fingerprintPasswordHash('stored-hash') },
        { expiresIn: '30m' },
      );
    });

    it('指纹为 sha256 十六进制的前 32 位', () => {
      const expected = createHash('sha256').update('stored-hash', 'utf8').digest('hex').substring(0, 32);
      expect(fingerprintPasswordHash('stored-hash')).toBe(expected);
      expect(fingerprintPasswordHash('stored-hash')).not.toBe(fingerprintPasswordHash('other-hash'));
    });

    it('签名失败时使用重置令牌专属错误码', () => {
      jwtService.sign.mockImplementation(() => {
        throw new Error('bad key');
      });

      expect(() => tokenHelper.generatePasswordResetToken({ userId: 3, passwordHash: 'stored-hash' })).toThrow(
        expect.objectContaining({
          code: JWT_ERROR.RESET_TOKEN_GENERATION_FAILED,
          message: 'Failed to generate password_reset token: bad key',
        }),
      );
    });
  });

  describe('verifyToken', () => {
    it('返回 payload', () => {
      jwtService.verify.mockReturnValue(mockJwtPayload);

      expect(tokenHelper.verifyToken({ token: mockToken })).toEqual(mockJwtPayload);
      expect(jwtService.verify).toHaveBeenCalledWith(mockToken);
    });

    it('过期时抛出 TOKEN_EXPIRED 且不记录日志', () => {
      jwtService.verify.mockImplementation(() => {
        throw new TokenExpiredError('jwt expired', new Date());
      });

      expect(() => tokenHelper.verifyToken({ token: mockToken })).toThrow(
        expect.objectContaining({ code: JWT_ERROR.TOKEN_EXPIRED, message: 'Token has expired.' }),
      );
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it('签名不符时记录告警', () => {
      jwtService.verify.mockImplementation(() => {
        throw new JsonWebTokenError('invalid signature');
      });

      expect(() => tokenHelper.verifyToken({ token: mockToken })).toThrow('Token is invalid.');
      expect(logger.warn).toHaveBeenCalledWith(
        {
          code: JWT_ERROR.TOKEN_INVALID,
          error: 'invalid signature',
          tokenPrefix: 'eyJhbGciOiJIUzI1NiIs...',
        },
        '收到无效令牌',
      );
    });

    it('未生效 token 抛出 TOKEN_NOT_BEFORE', () => {
      jwtService.verify.mockImplementation(() => {
        throw new NotBeforeError('jwt not active', new Date());
      });

      expect(() => tokenHelper.verifyToken({ token: mockToken })).toThrow(
        expect.objectContaining({ code: JWT_ERROR.TOKEN_NOT_BEFORE }),
      );
    });

    it('未知错误统一为 TOKEN_VERIFICATION_FAILED', () => {
      jwtService.verify.mockImplementation(() => {
        throw new Error('unknown error');
      });

      expect(() => tokenHelper.verifyToken({ token: mockToken })).toThrow(
        'Token verification failed: unknown error',
      );
    });
  });

  it('createPayloadFromUser 映射用户字段', () => {
    expect(
      tokenHelper.createPayloadFromUser({
        id: 9,
        username: 'ravi',
        email: null,
        accessGroup: ['STUDENT'],
      }),
    ).toEqual({ sub: 9, username: 'ravi', email: null, accessGroup: ['STUDENT'] });
  });
});
