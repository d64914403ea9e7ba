// src/adapters/api/decorators/roles.decorator.ts
import { AccessRole } from '@app-types/models/account.types';
import { SetMetadata } from '@nestjs/common';

export const ROLES_KEY = 'roles';

/**
 * 角色装饰器
 * 命中任一角色即可访问；ADMIN 令牌同时携带 STAFF
 */
// eslint-disable-next-line @typescript-eslint/naming-convention
export function Roles(...roles: AccessRole[]): MethodDecorator & ClassDecorator {
  return SetMetadata(ROLES_KEY, roles);
}
