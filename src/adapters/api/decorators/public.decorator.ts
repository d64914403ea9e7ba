// src/adapters/api/decorators/public.decorator.ts

import { SetMetadata } from '@nestjs/common';

export const IS_PUBLIC_KEY = 'isPublic';

/**
 * 公开访问装饰器
 * 标记无需登录的路由；携带有效令牌时仍会解析出当前用户
 */
// eslint-disable-next-line @typescript-eslint/naming-convention
export function Public(): MethodDecorator & ClassDecorator {
  return SetMetadata(IS_PUBLIC_KEY, true);
}
