// src/core/jwt/jwt.module.ts

import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtModule } from '@nestjs/jwt';
import type { Algorithm } from 'jsonwebtoken';

const SUPPORTED_ALGORITHMS: ReadonlyArray<Algorithm> = ['HS256', 'HS384', 'HS512'];

/**
 * 解析签名算法，仅接受 HMAC 系列
 * @param raw 配置值
 */
export function resolveAlgorithm(raw: string | undefined): Algorithm {
  const found = SUPPORTED_ALGORITHMS.find((alg) => alg === raw);
  return found ?? 'HS256';
}

/**
 * JWT 核心模块
 * 提供 JWT 相关的配置和服务
 */
@Module({
  imports: [
    JwtModule.registerAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) => ({
        secret: config.get<string>('jwt.secret'),
        signOptions: {
          expiresIn: config.get<string>('jwt.expiresIn'),
          algorithm: resolveAlgorithm(config.get<string>('jwt.algorithm')),
          issuer: config.get<string>('jwt.issuer'),
          audience: config.get<string>('jwt.audience'),
        },
      }),
    }),
  ],
  exports: [JwtModule],
})
export class CoreJwtModule {}
