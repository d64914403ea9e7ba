// src/modules/auth/strategies/jwt.strategy.ts

import { JwtPayload } from '@app-types/jwt.types';
import { buildAccessGroup } from '@app-types/models/account.types';
import { Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PassportStrategy } from '@nestjs/passport';
import { UserService } from '@src/modules/account/user.service';
import { PinoLogger } from 'nestjs-pino';
import { ExtractJwt, Strategy } from 'passport-jwt';

/**
 * Bearer 访问令牌校验
 * 角色以数据库当前状态为准，令牌内的 accessGroup 只用于前端展示
 */
@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(
    configService: ConfigService,
    private readonly userService: UserService,
    private readonly logger: PinoLogger,
  ) {
    const secret = configService.get<string>('jwt.secret');
    if (!secret) throw new Error('JWT secret 配置缺失');
    const audience = configService.get<string>('jwt.audience');

    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: secret,
      issuer: configService.get<string>('jwt.issuer') || undefined,
      audience: audience ? audience.split(',').map((aud) => aud.trim()) : undefined,
    });
    this.logger.setContext(JwtStrategy.name);
  }

  // 返回值成为 request.user
  async validate(payload: JwtPayload): Promise<JwtPayload> {
    if (payload.type !== 'access') {
      throw new UnauthorizedException('Invalid token type.');
    }

    const user = await this.userService.findById(payload.sub);
    if (!user || !user.isActive) {
      this.logger.warn({ userId: payload.sub }, '令牌对应的用户不存在或已停用');
      throw new UnauthorizedException('User not found or inactive.');
    }
    return {
      ...payload,
      username: user.username,
      accessGroup: buildAccessGroup({
        isSuperuser: user.isSuperuser,
        isStaff: user.isStaff,
      }),
    };
  }
}
