// src/modules/account/account-service.module.ts
import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { RoleEntity } from './role.entity';
import { RoleService } from './role.service';
import { UserEntity } from './user.entity';
import { UserService } from './user.service';

/**
 * 账户服务模块：用户与角色的基础读写
 */
@Module({
  imports: [TypeOrmModule.forFeature([UserEntity, RoleEntity])],
  providers: [UserService, RoleService],
  exports: [TypeOrmModule, UserService, RoleService],
})
export class AccountServiceModule {}
