// src/app.module.ts

import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ApiAdapterModule } from './adapters/api/api-adapter.module';
import { IntegrationEventsAdapterModule } from './adapters/integration-events/integration-events-adapter.module';
import { HttpExceptionsFilter } from './core/common/filters/http-exception.filter';
import { AppConfigModule } from './core/config/config.module';
import { DatabaseModule } from './core/database/database.module';
import { LoggerModule } from './core/logger/logger.module';
import { MiddlewareModule } from './core/middleware/middleware.module';
import { MailModule } from './infrastructure/mail/mail.module';
import { StorageModule } from './infrastructure/storage/storage.module';
import { SearchModule } from './modules/common/search.module';
import { SchedulingModule } from './modules/common/scheduling/scheduling.module';

@Module({
  imports: [
    AppConfigModule,
    LoggerModule,
    MiddlewareModule,
    DatabaseModule,
    // 全局基础设施：分页搜索、邮件、媒体文件
    SearchModule,
    MailModule,
    StorageModule,
    ApiAdapterModule,
    // 集成事件（内存 Outbox + 调度器）
    IntegrationEventsAdapterModule,
    SchedulingModule,
  ],
  providers: [
    {
      provide: APP_FILTER,
      useClass: HttpExceptionsFilter,
    },
  ],
})
export class AppModule {}
