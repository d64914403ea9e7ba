// src/adapters/api/notification/notifications.controller.ts
import type { UsecaseSession } from '@app-types/auth/session.types';
import { AccessRole } from '@app-types/models/account.types';
import type { NotificationLevel } from '@app-types/models/notification.types';
import type { NotificationEntity } from '@modules/notification/notification.entity';
import { NotificationService } from '@modules/notification/notification.service';
import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Query,
} from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { DailyNotificationsJob } from '@usecases/notification/daily-notifications.job';
import { SendBulkNotificationUsecase } from '@usecases/notification/send-bulk-notification.usecase';
import { currentSession } from '../decorators/current-user.decorator';
import { Roles } from '../decorators/roles.decorator';
import { mapPage, type DetailResponse, type ListResponse } from '../dto/detail.dto';
import { toSearchParams } from '../dto/list-query.dto';
import {
  CreateNotificationDto,
  NotificationQueryDto,
  SendBulkNotificationDto,
  UpdateNotificationDto,
} from './dto/notification.dto';

export interface NotificationView {
  readonly id: number;
  readonly title: string;
  readonly message: string;
  readonly level: NotificationLevel;
  readonly isRead: boolean;
  readonly createdAt: Date;
}

export function toNotificationView(notification: NotificationEntity): NotificationView {
  return {
    id: notification.id,
    title: notification.title,
    message: notification.message,
    level: notification.level,
    isRead: notification.isRead,
    createdAt: notification.createdAt,
  };
}

/**
 * 站内通知：始终限定为当前用户本人的记录
 */
@ApiTags('notifications')
@ApiBearerAuth()
@Controller('notifications')
export class NotificationsController {
  constructor(
    private readonly notificationService: NotificationService,
    private readonly sendBulkUsecase: SendBulkNotificationUsecase,
    private readonly dailyNotificationsJob: DailyNotificationsJob,
  ) {}

  @Get()
  async list(
    @currentSession() session: UsecaseSession,
    @Query() query: NotificationQueryDto,
  ): Promise<ListResponse<NotificationView>> {
    const page = await this.notificationService.searchOwned(
      session.accountId,
      toSearchParams(query, { isRead: query.isRead, level: query.level }),
    );
    return mapPage(page, toNotificationView);
  }

  @Post('mark-all-read')
  @HttpCode(HttpStatus.OK)
  async markAllRead(@currentSession() session: UsecaseSession): Promise<{ updated: number }> {
    return { updated: await this.notificationService.markAllRead(session.accountId) };
  }

  @Roles(AccessRole.ADMIN)
  @Post('send-bulk')
  async sendBulk(@Body() body: SendBulkNotificationDto): Promise<DetailResponse> {
    return this.sendBulkUsecase.execute(body);
  }

  @Roles(AccessRole.ADMIN)
  @Post('jobs/daily')
  @HttpCode(HttpStatus.OK)
  async runDaily(): Promise<{ created: number }> {
    return this.dailyNotificationsJob.run();
  }

  @Get(':id')
  async get(
    @currentSession() session: UsecaseSession,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<NotificationView> {
    return toNotificationView(await this.notificationService.getOwnedOrThrow(session.accountId, id));
  }

  @Post()
  async create(
    @currentSession() session: UsecaseSession,
    @Body() body: CreateNotificationDto,
  ): Promise<NotificationView> {
    return toNotificationView(await this.notificationService.create(session.accountId, body));
  }

  @Patch(':id')
  async update(
    @currentSession() session: UsecaseSession,
    @Param('id', ParseIntPipe) id: number,
    @Body() body: UpdateNotificationDto,
  ): Promise<NotificationView> {
    return toNotificationView(await this.notificationService.update(session.accountId, id, body));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(
    @currentSession() session: UsecaseSession,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<void> {
    await this.notificationService.remove(session.accountId, id);
  }
}
