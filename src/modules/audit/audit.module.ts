// src/modules/audit/audit.module.ts
import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { UserEntity } from '../account/user.entity';
import { AuditHistoryEntity } from './audit-history.entity';
import { AuditHistoryService } from './audit-history.service';

/**
 * 变更历史模块
 * 订阅器在 DatabaseModule 中注册，这里只提供查询
 */
@Module({
  imports: [TypeOrmModule.forFeature([AuditHistoryEntity, UserEntity])],
  providers: [AuditHistoryService],
  exports: [AuditHistoryService],
})
export class AuditModule {}
