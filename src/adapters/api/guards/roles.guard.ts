// src/adapters/api/guards/roles.guard.ts

import { normalizeAccessGroup } from '@app-types/auth/session.types';
import { JwtPayload } from '@app-types/jwt.types';
import { DomainError, JWT_ERROR, PERMISSION_ERROR } from '@core/common/errors/domain-error';
import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import type { Request } from 'express';
import { ROLES_KEY } from '../decorators/roles.decorator';

/**
 * 角色权限守卫
 * 未标注 @Roles 的路由直接放行，认证由 JwtAuthGuard 负责
 */
@Injectable()
export class RolesGuard implements CanActivate {
  constructor(private readonly reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const requiredRoles = this.reflector.getAllAndOverride<string[] | undefined>(ROLES_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (!requiredRoles || requiredRoles.length === 0) {
      return true;
    }

    const request = context.switchToHttp().getRequest<Request & { user?: JwtPayload | null }>();
    const user = request.user;
    if (!user) {
      throw new DomainError(
        JWT_ERROR.AUTHENTICATION_FAILED,
        'Authentication credentials were not provided.',
        { requiredRoles },
      );
    }

    this.assertHasAnyRequiredRole(user, requiredRoles);
    return true;
  }

  /**
   * 断言用户拥有至少一个所需角色
   */
  private assertHasAnyRequiredRole(user: JwtPayload, requiredRoles: string[]): void {
    const userRoles = normalizeAccessGroup(user.accessGroup);
    const hasRole = requiredRoles.some((role) => userRoles.includes(role.toUpperCase()));
    if (!hasRole) {
      throw new DomainError(
        PERMISSION_ERROR.INSUFFICIENT_PERMISSIONS,
        'You do not have permission to perform this action.',
        { requiredRoles, userRoles },
      );
    }
  }
}
