// src/usecases/auth/refresh-token.usecase.ts
import { buildAccessGroup } from '@app-types/models/account.types';
import { AUTH_ERROR, DomainError, isDomainError } from '@core/common/errors/domain-error';
import { TokenHelper } from '@core/common/token/token.helper';
import { UserService } from '@modules/account/user.service';
import { Injectable } from '@nestjs/common';

/**
 * 刷新访问令牌
 */
@Injectable()
export class RefreshTokenUsecase {
  constructor(
    private readonly userService: UserService,
    private readonly tokenHelper: TokenHelper,
  ) {}

  async execute({ refresh }: { readonly refresh: string }): Promise<{ access: string }> {
    const payload = this.verify(refresh);
    if (payload.type !== 'refresh') throw this.invalid({ reason: 'type', type: payload.type });

    const user = await this.userService.findById(payload.sub);
    if (!user || !user.isActive) throw this.invalid({ reason: 'user', userId: payload.sub });

    const access = this.tokenHelper.generateAccessToken({
      payload: this.tokenHelper.createPayloadFromUser({
        id: user.id,
        username: user.username,
        email: user.email || null,
        accessGroup: buildAccessGroup({
          isSuperuser: user.isSuperuser,
          isStaff: user.isStaff,
        }),
      }),
    });
    return { access };
  }

  private verify(token: string): ReturnType<TokenHelper['verifyToken']> {
    try {
      return this.tokenHelper.verifyToken({ token });
    } catch (error) {
      if (isDomainError(error)) throw this.invalid({ reason: error.code }, error);
      throw error;
    }
  }

  private invalid(details: Record<string, unknown>, cause?: unknown): DomainError {
    return new DomainError(
      AUTH_ERROR.INVALID_REFRESH_TOKEN,
      'Token is invalid or expired',
      details,
      cause,
    );
  }
}
