// src/usecases/messaging/conversation.usecase.ts
import { type UsecaseSession, isStaffSession } from '@app-types/auth/session.types';
import { DomainError, MESSAGING_ERROR } from '@core/common/errors/domain-error';
import { type ConversationSide, messagePreview } from '@core/messaging/messaging.policy';
import { fullName } from '@modules/account/user.entity';
import { ConversationEntity } from '@modules/messaging/conversation.entity';
import { MessageEntity } from '@modules/messaging/message.entity';
import { MessagingService } from '@modules/messaging/messaging.service';
import { StudentService } from '@modules/student/student.service';
import { Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';

export const CONVERSATION_NOT_FOUND_MESSAGE = 'Conversation not found or access denied.';
export const STUDENT_PROFILE_NOT_FOUND_MESSAGE = 'Student profile not found.';

export interface MessageView {
  readonly id: number;
  readonly conversationId: number;
  readonly senderId: number;
  readonly senderName: string;
  readonly body: string;
  readonly sentAt: Date;
  readonly isFromStudent: boolean;
}

export interface ConversationView {
  readonly id: number;
  readonly studentId: number;
  readonly studentName: string;
  readonly studentRegNo: string;
  readonly createdAt: Date;
  readonly lastMessageAt: Date;
  readonly studentRead: boolean;
  readonly adminRead: boolean;
  readonly lastMessagePreview?: string | null;
  readonly messages?: MessageView[];
}

/** 消息视图；发送者即会话学员本人时视为学员消息 */
export function toMessageView(message: MessageEntity, studentUserId: number | undefined): MessageView {
  const sender = message.sender;
  return {
    id: message.id,
    conversationId: message.conversationId,
    senderId: message.senderId,
    senderName: sender ? fullName(sender) || sender.username : '',
    body: message.body,
    sentAt: message.sentAt,
    isFromStudent: message.senderId === studentUserId,
  };
}

function toConversationView(conversation: ConversationEntity): ConversationView {
  const user = conversation.student?.user;
  return {
    id: conversation.id,
    studentId: conversation.studentId,
    studentName: user ? fullName(user) || user.username : '',
    studentRegNo: conversation.student?.regNo ?? '',
    createdAt: conversation.createdAt,
    lastMessageAt: conversation.lastMessageAt,
    studentRead: conversation.studentRead,
    adminRead: conversation.adminRead,
  };
}

const sideOf = (session: UsecaseSession): ConversationSide =>
  isStaffSession(session) ? 'admin' : 'student';

/**
 * 学员与管理员之间的会话
 * 员工可访问全部会话，学员只能访问自己的会话
 */
@Injectable()
export class ConversationUsecase {
  constructor(
    private readonly messagingService: MessagingService,
    private readonly studentService: StudentService,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(ConversationUsecase.name);
  }

  async list(session: UsecaseSession): Promise<ConversationView[]> {
    if (isStaffSession(session)) {
      const conversations = await this.messagingService.findAllConversations();
      const latest = await this.messagingService.latestMessages(conversations.map((c) => c.id));
      return conversations.map((conversation) => ({
        ...toConversationView(conversation),
        lastMessagePreview: messagePreview(latest.get(conversation.id)?.body),
      }));
    }

    const student = await this.studentService.findByUserId(session.accountId);
    if (!student) return [];
    const conversation = await this.messagingService.findByStudent(student.id);
    if (!conversation) return [];
    return [await this.withMessages(conversation)];
  }

  async get(session: UsecaseSession, id: number): Promise<ConversationView> {
    const conversation = await this.scoped(session, id);
    return isStaffSession(session) ? toConversationView(conversation) : this.withMessages(conversation);
  }

  /** 学员取得（必要时创建）自己的会话，并标记学员侧已读 */
  async mine(session: UsecaseSession): Promise<ConversationView> {
    const student = await this.studentService.getByUserIdOrThrow(
      session.accountId,
      STUDENT_PROFILE_NOT_FOUND_MESSAGE,
    );
    const conversation = await this.messagingService.getOrCreateForStudent(student.id);
    await this.messagingService.markRead(conversation, 'student');
    return this.withMessages(conversation);
  }

  /** 消息按时间正序，并将调用方一侧标为已读 */
  async messages(session: UsecaseSession, id: number): Promise<MessageView[]> {
    const conversation = await this.scoped(session, id);
    await this.messagingService.markRead(conversation, sideOf(session));
    const messages = await this.messagingService.listMessages(conversation.id);
    return messages.map((message) => toMessageView(message, conversation.student?.userId));
  }

  async send(session: UsecaseSession, id: number, body: string): Promise<MessageView> {
    const conversation = await this.scoped(session, id);
    const message = await this.messagingService.send({
      conversationId: conversation.id,
      senderId: session.accountId,
      senderSide: sideOf(session),
      body,
    });
    this.logger.info(
      { conversationId: conversation.id, senderId: session.accountId, side: sideOf(session) },
      '会话新消息',
    );
    return toMessageView(message, conversation.student?.userId);
  }

  private async scoped(session: UsecaseSession, id: number): Promise<ConversationEntity> {
    const conversation = await this.messagingService.findConversation(id);
    const isOwner = conversation?.student?.userId === session.accountId;
    if (!conversation || !(isOwner || isStaffSession(session))) {
      throw new DomainError(MESSAGING_ERROR.CONVERSATION_NOT_FOUND, CONVERSATION_NOT_FOUND_MESSAGE, {
        id,
      });
    }
    return conversation;
  }

  private async withMessages(conversation: ConversationEntity): Promise<ConversationView> {
    const messages = await this.messagingService.listMessages(conversation.id);
    return {
      ...toConversationView(conversation),
      messages: messages.map((message) => toMessageView(message, conversation.student?.userId)),
    };
  }
}
