// src/core/common/password/password.module.ts
import { Module } from '@nestjs/common';
import { PasswordPolicyService } from './password-policy.service';

// 建账号、学生建档、重置密码共用同一套强度规则；哈希由 UserService 直接调用 PasswordPbkdf2Helper
@Module({
  providers: [PasswordPolicyService],
  exports: [PasswordPolicyService],
})
export class PasswordModule {}
