// src/core/database/database.module.ts

import { AuditHistorySubscriber } from '@modules/audit/audit-history.subscriber';
import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';

interface MysqlSettings {
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
  timezone: string;
  charset: string;
  synchronize: boolean;
  logging: boolean;
  extra: Record<string, unknown>;
}

export function buildTypeOrmOptions(config: ConfigService): TypeOrmModuleOptions {
  const mysql = config.getOrThrow<MysqlSettings>('mysql');
  return {
    type: 'mysql',
    ...mysql,
    // DECIMAL 列以字符串读出，金额统一走 money 工具换算为分
    supportBigNumbers: true,
    // 实体由各 *ServiceModule 的 TypeOrmModule.forFeature 注册
    autoLoadEntities: true,
    // User / Student 的每次写入追加一条历史记录
    subscribers: [AuditHistorySubscriber],
  };
}

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: buildTypeOrmOptions,
    }),
  ],
  exports: [TypeOrmModule],
})
export class DatabaseModule {}
