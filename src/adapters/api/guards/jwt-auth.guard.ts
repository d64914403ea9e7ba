// src/adapters/api/guards/jwt-auth.guard.ts

import { JwtPayload } from '@app-types/jwt.types';
import { DomainError, JWT_ERROR } from '@core/common/errors/domain-error';
import { ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { AuthGuard } from '@nestjs/passport';
import type { Request } from 'express';
import { isObservable, lastValueFrom } from 'rxjs';
import { IS_PUBLIC_KEY } from '../decorators/public.decorator';

/**
 * JWT 认证守卫（全局注册）
 * - 普通路由：令牌缺失或无效即 401
 * - @Public 路由：未携带 Authorization 时匿名放行；携带时照常校验
 */
@Injectable()
export class JwtAuthGuard extends AuthGuard('jwt') {
  constructor(private readonly reflector: Reflector) {
    super();
  }

  async canActivate(context: ExecutionContext): Promise<boolean> {
    if (this.isPublic(context)) {
      const request = context.switchToHttp().getRequest<Request>();
      if (!request.headers.authorization) return true;
    }
    const result = super.canActivate(context);
    if (isObservable(result)) return lastValueFrom(result);
    return result;
  }

  /**
   * 处理请求验证结果
   */
  handleRequest<TUser = JwtPayload>(
    err: Error | null,
    user: TUser | false,
    _info: unknown,
    _context: ExecutionContext,
  ): TUser {
    if (err || !user) {
      if (err && err instanceof DomainError) {
        throw err;
      }

      throw new DomainError(
        JWT_ERROR.AUTHENTICATION_FAILED,
        'Authentication credentials were not provided or are invalid.',
        { originalError: err?.message },
        err,
      );
    }

    return user;
  }

  private isPublic(context: ExecutionContext): boolean {
    return (
      this.reflector.getAllAndOverride<boolean | undefined>(IS_PUBLIC_KEY, [
        context.getHandler(),
        context.getClass(),
      ]) ?? false
    );
  }
}
