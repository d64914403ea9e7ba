// src/core/middleware/middleware.module.ts

import { MiddlewareConsumer, Module, NestModule, RequestMethod } from '@nestjs/common';
import { FormatResponseMiddleware } from './format-response.middleware';

// 所有 /api/v1 路由的 JSON 响应统一包成 { success, data, errorCode, ... }
// PDF 下载走 StreamableFile、媒体走静态目录，均不经过 res.json
@Module({
  providers: [FormatResponseMiddleware],
})
export class MiddlewareModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(FormatResponseMiddleware).forRoutes({ path: '*', method: RequestMethod.ALL });
  }
}
