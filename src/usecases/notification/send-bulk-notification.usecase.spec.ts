// src/usecases/notification/send-bulk-notification.usecase.spec.ts
import { NotificationLevel } from '@app-types/models/notification.types';
import { NOTIFICATION_ERROR } from '@core/common/errors/domain-error';
import { RoleService } from '@modules/account/role.service';
import { UserService } from '@modules/account/user.service';
import { NotificationService } from '@modules/notification/notification.service';
import { Test } from '@nestjs/testing';
import { PinoLogger } from 'nestjs-pino';
import {
  NO_TARGET_USERS_MESSAGE,
  SendBulkNotificationUsecase,
  TARGET_REQUIRED_MESSAGE,
} from './send-bulk-notification.usecase';

describe('SendBulkNotificationUsecase', () => {
  const notificationService = { createForUsers: jest.fn() };
  const userService = { findActiveIds: jest.fn(), getOrThrow: jest.fn() };
  const roleService = { findById: jest.fn() };
  const logger = { setContext: jest.fn(), info: jest.fn() };
  let usecase: SendBulkNotificationUsecase;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        SendBulkNotificationUsecase,
        { provide: NotificationService, useValue: notificationService },
        { provide: UserService, useValue: userService },
        { provide: RoleService, useValue: roleService },
        { provide: PinoLogger, useValue: logger },
      ],
    }).compile();
    usecase = moduleRef.get(SendBulkNotificationUsecase);
  });

  it('没有目标时拒绝', async () => {
    await expect(usecase.execute({ title: 'Holiday', message: 'Closed on Friday' })).rejects.toMatchObject({
      code: NOTIFICATION_ERROR.TARGET_REQUIRED,
      message: TARGET_REQUIRED_MESSAGE,
    });
  });

  it('角色不存在时返回 404 文案', async () => {
    roleService.findById.mockResolvedValue(null);

    await expect(
      usecase.execute({ title: 'Holiday', message: 'Closed on Friday', roleId: 9 }),
    ).rejects.toMatchObject({ code: NOTIFICATION_ERROR.ROLE_NOT_FOUND, message: 'Role with id 9 not found.' });
  });

  it('用户与角色目标合并去重', async () => {
    userService.getOrThrow.mockResolvedValue({ id: 3 });
    roleService.findById.mockResolvedValue({ id: 2 });
    userService.findActiveIds.mockResolvedValue([3, 4, 5]);
    notificationService.createForUsers.mockResolvedValue(3);

    await expect(
      usecase.execute({ title: 'Holiday', message: 'Closed on Friday', userId: 3, roleId: 2 }),
    ).resolves.toEqual({ detail: 'Successfully sent notification to 3 user(s).' });
    expect(userService.findActiveIds).toHaveBeenCalledWith({ roleId: 2 });
    expect(notificationService.createForUsers).toHaveBeenCalledWith([3, 4, 5], {
      title: 'Holiday',
      message: 'Closed on Friday',
      level: NotificationLevel.INFO,
    });
  });

  it('角色下没有用户时拒绝', async () => {
    roleService.findById.mockResolvedValue({ id: 2 });
    userService.findActiveIds.mockResolvedValue([]);

    await expect(
      usecase.execute({ title: 'Holiday', message: 'Closed on Friday', roleId: 2 }),
    ).rejects.toMatchObject({ code: NOTIFICATION_ERROR.NO_TARGET_USERS, message: NO_TARGET_USERS_MESSAGE });
  });
});
