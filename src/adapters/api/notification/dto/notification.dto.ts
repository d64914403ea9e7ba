// src/adapters/api/notification/dto/notification.dto.ts
import { NotificationLevel } from '@app-types/models/notification.types';
import {
  IsBoolean,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';
import { ListQueryDto, QueryBoolean } from '../../dto/list-query.dto';

const LEVEL_MESSAGE = 'level must be one of info, success, warning, error.';

export class CreateNotificationDto {
  @IsString()
  @IsNotEmpty({ message: 'title may not be blank.' })
  @MaxLength(120, { message: 'title must be at most 120 characters.' })
  title!: string;

  @IsString()
  @IsNotEmpty({ message: 'message may not be blank.' })
  message!: string;

  @IsOptional()
  @IsEnum(NotificationLevel, { message: LEVEL_MESSAGE })
  level?: NotificationLevel;

  @IsOptional()
  @IsBoolean({ message: 'isRead must be a boolean.' })
  isRead?: boolean;
}

export class UpdateNotificationDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty({ message: 'title may not be blank.' })
  @MaxLength(120, { message: 'title must be at most 120 characters.' })
  title?: string;

  @IsOptional()
  @IsString()
  message?: string;

  @IsOptional()
  @IsEnum(NotificationLevel, { message: LEVEL_MESSAGE })
  level?: NotificationLevel;

  @IsOptional()
  @IsBoolean({ message: 'isRead must be a boolean.' })
  isRead?: boolean;
}

export class NotificationQueryDto extends ListQueryDto {
  @IsOptional()
  @QueryBoolean()
  @IsBoolean({ message: 'isRead must be a boolean.' })
  isRead?: boolean;

  @IsOptional()
  @IsEnum(NotificationLevel, { message: LEVEL_MESSAGE })
  level?: NotificationLevel;
}

/** 目标至少一项由用例校验 */
export class SendBulkNotificationDto {
  @IsString()
  @IsNotEmpty({ message: 'title may not be blank.' })
  @MaxLength(120, { message: 'title must be at most 120 characters.' })
  title!: string;

  @IsString()
  @IsNotEmpty({ message: 'message may not be blank.' })
  message!: string;

  @IsOptional()
  @IsEnum(NotificationLevel, { message: LEVEL_MESSAGE })
  level?: NotificationLevel;

  @IsOptional()
  @IsInt({ message: 'userId must be an integer.' })
  userId?: number;

  @IsOptional()
  @IsInt({ message: 'roleId must be an integer.' })
  roleId?: number;

  @IsOptional()
  @IsBoolean({ message: 'sendToAll must be a boolean.' })
  sendToAll?: boolean;
}
