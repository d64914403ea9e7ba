// src/core/config/config.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import databaseConfig from './database.config';
import jwtConfig from './jwt.config';
import loggerConfig from './logger.config';
import mailConfig from './mail.config';
import outboxConfig from './outbox.config';
import paginationConfig from './pagination.config';
import schedulerConfig from './scheduler.config';
import serverConfig from './server.config';
import storageConfig from './storage.config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true, // 使 ConfigService 全局可用（无需再次 import）
      envFilePath: [
        `env/.env.${process.env.NODE_ENV || 'development'}`,
        'env/.env.development', // 备用文件
      ],
      load: [
        serverConfig,
        loggerConfig,
        databaseConfig,
        jwtConfig,
        paginationConfig,
        schedulerConfig,
        outboxConfig,
        mailConfig,
        storageConfig,
      ],
    }),
  ],
})
export class AppConfigModule {}
