// src/adapters/api/messaging/conversations.controller.ts
import type { UsecaseSession } from '@app-types/auth/session.types';
import { AccessRole } from '@app-types/models/account.types';
import { Body, Controller, Get, Param, ParseIntPipe, Post } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import {
  ConversationUsecase,
  type ConversationView,
  type MessageView,
} from '@usecases/messaging/conversation.usecase';
import { currentSession } from '../decorators/current-user.decorator';
import { Roles } from '../decorators/roles.decorator';
import { SendMessageDto } from './dto/message.dto';

/**
 * 学员与教务之间的会话
 * 员工可见全部，学员仅见本人会话；越权访问统一按不存在处理
 */
@ApiTags('conversations')
@ApiBearerAuth()
@Controller('conversations')
export class ConversationsController {
  constructor(private readonly conversationUsecase: ConversationUsecase) {}

  @Get()
  async list(@currentSession() session: UsecaseSession): Promise<ConversationView[]> {
    return this.conversationUsecase.list(session);
  }

  // 须在 :id 之前声明
  @Roles(AccessRole.STUDENT)
  @Get('my-conversation')
  async mine(@currentSession() session: UsecaseSession): Promise<ConversationView> {
    return this.conversationUsecase.mine(session);
  }

  @Get(':id')
  async get(
    @currentSession() session: UsecaseSession,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<ConversationView> {
    return this.conversationUsecase.get(session, id);
  }

  @Get(':id/messages')
  async messages(
    @currentSession() session: UsecaseSession,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<MessageView[]> {
    return this.conversationUsecase.messages(session, id);
  }

  @Post(':id/messages')
  async send(
    @currentSession() session: UsecaseSession,
    @Param('id', ParseIntPipe) id: number,
    @Body() body: SendMessageDto,
  ): Promise<MessageView> {
    return this.conversationUsecase.send(session, id, body.body);
  }
}
