// src/usecases/notification/send-bulk-notification.usecase.ts
import { NotificationLevel } from '@app-types/models/notification.types';
import { DomainError, NOTIFICATION_ERROR } from '@core/common/errors/domain-error';
import { RoleService } from '@modules/account/role.service';
import { UserService } from '@modules/account/user.service';
import { NotificationService } from '@modules/notification/notification.service';
import { Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';

export const TARGET_REQUIRED_MESSAGE =
  'Must provide at least one target: user_id, role_id, or send_to_all.';
export const NO_TARGET_USERS_MESSAGE = 'No target users found for the specified criteria.';

export interface BulkNotificationInput {
  readonly title: string;
  readonly message: string;
  readonly level?: NotificationLevel;
  readonly userId?: number;
  readonly roleId?: number;
  readonly sendToAll?: boolean;
}

/**
 * 群发通知：目标可组合，按用户去重
 */
@Injectable()
export class SendBulkNotificationUsecase {
  constructor(
    private readonly notificationService: NotificationService,
    private readonly userService: UserService,
    private readonly roleService: RoleService,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(SendBulkNotificationUsecase.name);
  }

  async execute(input: BulkNotificationInput): Promise<{ detail: string }> {
    if (input.userId === undefined && input.roleId === undefined && !input.sendToAll) {
      throw new DomainError(NOTIFICATION_ERROR.TARGET_REQUIRED, TARGET_REQUIRED_MESSAGE);
    }

    const targets = new Set<number>();
    if (input.sendToAll) {
      for (const id of await this.userService.findActiveIds()) targets.add(id);
    }
    if (input.userId !== undefined) {
      const user = await this.userService.getOrThrow(input.userId);
      targets.add(user.id);
    }
    if (input.roleId !== undefined) {
      const role = await this.roleService.findById(input.roleId);
      if (!role) {
        throw new DomainError(
          NOTIFICATION_ERROR.ROLE_NOT_FOUND,
          `Role with id ${input.roleId} not found.`,
          { roleId: input.roleId },
        );
      }
      for (const id of await this.userService.findActiveIds({ roleId: role.id })) targets.add(id);
    }

    if (targets.size === 0) {
      throw new DomainError(NOTIFICATION_ERROR.NO_TARGET_USERS, NO_TARGET_USERS_MESSAGE);
    }

    const created = await this.notificationService.createForUsers([...targets], {
      title: input.title,
      message: input.message,
      level: input.level ?? NotificationLevel.INFO,
    });
    this.logger.info({ title: input.title, created }, '群发通知完成');
    return { detail: `Successfully sent notification to ${created} user(s).` };
  }
}
