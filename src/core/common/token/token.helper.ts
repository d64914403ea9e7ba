// src/core/common/token/token.helper.ts

import {
  GenerateAccessTokenParams,
  GeneratePasswordResetTokenParams,
  GenerateRefreshTokenParams,
  JwtPayload,
  JwtTokenType,
} from '@app-types/jwt.types';
import { Injectable } from '@nestjs/common';
import { JsonWebTokenError, JwtService, NotBeforeError, TokenExpiredError } from '@nestjs/jwt';
import { createHash } from 'crypto';
import { PinoLogger } from 'nestjs-pino';
import { DomainError, JWT_ERROR } from '../errors/domain-error';

/**
 * 密码哈希指纹
 * 重置令牌只带指纹；密码一旦修改指纹失配，旧链接随即失效
 */
export function fingerprintPasswordHash(passwordHash: string): string {
  return createHash('sha256').update(passwordHash, 'utf8').digest('hex').substring(0, 32);
}

const SIGN_FAILURE_CODES: Readonly<Record<JwtTokenType, string>> = {
  access: JWT_ERROR.ACCESS_TOKEN_GENERATION_FAILED,
  refresh: JWT_ERROR.REFRESH_TOKEN_GENERATION_FAILED,
  password_reset: JWT_ERROR.RESET_TOKEN_GENERATION_FAILED,
};

// 子类在前：TokenExpiredError / NotBeforeError 都继承自 JsonWebTokenError
const VERIFY_FAILURES: ReadonlyArray<{
  readonly match: (error: unknown) => boolean;
  readonly code: string;
  readonly message: string;
  readonly suspicious: boolean;
}> = [
  {
    match: (e) => e instanceof TokenExpiredError,
    code: JWT_ERROR.TOKEN_EXPIRED,
    message: 'Token has expired.',
    suspicious: false,
  },
  {
    match: (e) => e instanceof NotBeforeError,
    code: JWT_ERROR.TOKEN_NOT_BEFORE,
    message: 'Token is not active yet.',
    suspicious: true,
  },
  {
    match: (e) => e instanceof JsonWebTokenError,
    code: JWT_ERROR.TOKEN_INVALID,
    message: 'Token is invalid.',
    suspicious: true,
  },
];

const errorText = (error: unknown): string => (error instanceof Error ? error.message : 'unknown error');

/**
 * 签发与校验三类令牌：access（接口访问）、refresh（换取 access）、password_reset（邮件重置链接）
 */
@Injectable()
export class TokenHelper {
  constructor(
    private readonly jwtService: JwtService,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(TokenHelper.name);
  }

  generateAccessToken({ payload, expiresIn }: GenerateAccessTokenParams): string {
    return this.issue('access', payload.sub, { ...payload, type: 'access' }, expiresIn);
  }

  generateRefreshToken({ payload, tokenVersion = 1, expiresIn }: GenerateRefreshTokenParams): string {
    return this.issue('refresh', payload.sub, { sub: payload.sub, type: 'refresh', tokenVersion }, expiresIn);
  }

  generatePasswordResetToken({
    userId,
    passwordHash,
    expiresIn = '30m',
  }: GeneratePasswordResetTokenParams & { expiresIn?: string }): string {
    return this.issue(
      'password_reset',
      userId,
      { sub: userId, type: 'password_reset', pwd: fingerprintPasswordHash(passwordHash) },
      expiresIn,
    );
  }

  /** 校验签名、有效期与 issuer/audience */
  verifyToken({ token }: { token: string }): JwtPayload {
    try {
      return this.jwtService.verify<JwtPayload>(token);
    } catch (error) {
      const tokenPrefix = `${token.substring(0, 20)}...`;
      const failure = VERIFY_FAILURES.find((f) => f.match(error));
      if (!failure) {
        throw new DomainError(
          JWT_ERROR.TOKEN_VERIFICATION_FAILED,
          `Token verification failed: ${errorText(error)}`,
          { tokenPrefix },
          error,
        );
      }
      if (failure.suspicious) {
        this.logger.warn({ code: failure.code, error: errorText(error), tokenPrefix }, '收到无效令牌');
      }
      throw new DomainError(failure.code, failure.message, { tokenPrefix }, error);
    }
  }

  createPayloadFromUser(user: {
    id: number;
    username: string;
    email: string | null;
    accessGroup: string[];
  }): Pick<JwtPayload, 'sub' | 'username' | 'email' | 'accessGroup'> {
    return { sub: user.id, username: user.username, email: user.email, accessGroup: user.accessGroup };
  }

  private issue(
    tokenType: JwtTokenType,
    userId: number,
    claims: Record<string, unknown>,
    expiresIn: string | undefined,
  ): string {
    try {
      return this.jwtService.sign(claims, expiresIn ? { expiresIn } : {});
    } catch (error) {
      this.logger.error({ userId, tokenType, error: errorText(error) }, '令牌签发失败');
      throw new DomainError(
        SIGN_FAILURE_CODES[tokenType],
        `Failed to generate ${tokenType} token: ${errorText(error)}`,
        { userId, tokenType },
        error,
      );
    }
  }
}
