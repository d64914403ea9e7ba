// src/adapters/api/decorators/current-user.decorator.ts
import { mapJwtToUsecaseSession, type UsecaseSession } from '@app-types/auth/session.types';
import { JwtPayload } from '@app-types/jwt.types';
import { DomainError, JWT_ERROR } from '@core/common/errors/domain-error';
import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { Request } from 'express';

type AuthedRequest = Request & { user?: JwtPayload | null };

function readUser(context: ExecutionContext): JwtPayload | null {
  return context.switchToHttp().getRequest<AuthedRequest>().user ?? null;
}

function requireUser(context: ExecutionContext): JwtPayload {
  const user = readUser(context);
  if (!user) {
    throw new DomainError(JWT_ERROR.AUTHENTICATION_FAILED, 'Authentication credentials were not provided.');
  }
  return user;
}

/**
 * 当前登录用户（JWT 载荷）
 */
export const currentUser = createParamDecorator(
  (_data: unknown, context: ExecutionContext): JwtPayload => requireUser(context),
);

/**
 * 当前会话（usecase 层使用）
 */
export const currentSession = createParamDecorator(
  (_data: unknown, context: ExecutionContext): UsecaseSession =>
    mapJwtToUsecaseSession(requireUser(context)),
);

/**
 * 公开路由上的可选会话，未登录为 null
 */
export const optionalSession = createParamDecorator(
  (_data: unknown, context: ExecutionContext): UsecaseSession | null => {
    const user = readUser(context);
    return user ? mapJwtToUsecaseSession(user) : null;
  },
);
