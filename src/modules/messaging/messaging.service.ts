// src/modules/messaging/messaging.service.ts
import { ConversationSide, readFlagsAfterSend } from '@core/messaging/messaging.policy';
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { ConversationEntity } from './conversation.entity';
import { MessageEntity } from './message.entity';

const CONVERSATION_RELATIONS = { student: { user: true } } as const;

/**
 * 站内会话服务
 * 每个学员一个会话，学员与管理员两侧各自维护已读标记
 */
@Injectable()
export class MessagingService {
  constructor(
    @InjectRepository(ConversationEntity)
    private readonly conversationRepository: Repository<ConversationEntity>,
    @InjectRepository(MessageEntity)
    private readonly messageRepository: Repository<MessageEntity>,
  ) {}

  /** 全部会话，最近消息在前 */
  async findAllConversations(): Promise<ConversationEntity[]> {
    return this.conversationRepository.find({
      relations: CONVERSATION_RELATIONS,
      order: { lastMessageAt: 'DESC', id: 'DESC' },
    });
  }

  async findConversation(id: number): Promise<ConversationEntity | null> {
    return this.conversationRepository.findOne({ where: { id }, relations: CONVERSATION_RELATIONS });
  }

  async findByStudent(studentId: number): Promise<ConversationEntity | null> {
    return this.conversationRepository.findOne({
      where: { studentId },
      relations: CONVERSATION_RELATIONS,
    });
  }

  async getOrCreateForStudent(studentId: number): Promise<ConversationEntity> {
    const existing = await this.findByStudent(studentId);
    if (existing) return existing;
    await this.conversationRepository.save(
      this.conversationRepository.create({
        studentId,
        lastMessageAt: new Date(),
        studentRead: true,
        adminRead: true,
      }),
    );
    const created = await this.findByStudent(studentId);
    if (!created) throw new Error(`会话创建后读取失败: studentId=${studentId}`);
    return created;
  }

  /** 会话消息，最早在前 */
  async listMessages(conversationId: number): Promise<MessageEntity[]> {
    return this.messageRepository.find({
      where: { conversationId },
      relations: { sender: true },
      order: { sentAt: 'ASC', id: 'ASC' },
    });
  }

  /** 多个会话的最近一条消息 */
  async latestMessages(conversationIds: ReadonlyArray<number>): Promise<Map<number, MessageEntity>> {
    const latest = new Map<number, MessageEntity>();
    if (conversationIds.length === 0) return latest;
    const messages = await this.messageRepository
      .createQueryBuilder('message')
      .where('message.conversationId IN (:...ids)', { ids: [...conversationIds] })
      .orderBy('message.sentAt', 'DESC')
      .addOrderBy('message.id', 'DESC')
      .getMany();
    for (const message of messages) {
      if (!latest.has(message.conversationId)) latest.set(message.conversationId, message);
    }
    return latest;
  }

  async markRead(conversation: ConversationEntity, side: ConversationSide): Promise<void> {
    if (side === 'student') {
      if (conversation.studentRead) return;
      await this.conversationRepository.update({ id: conversation.id }, { studentRead: true });
      conversation.studentRead = true;
      return;
    }
    if (conversation.adminRead) return;
    await this.conversationRepository.update({ id: conversation.id }, { adminRead: true });
    conversation.adminRead = true;
  }

  /**
   * 发送消息：接收方置为未读并刷新最近消息时间
   */
  async send(input: {
    readonly conversationId: number;
    readonly senderId: number;
    readonly senderSide: ConversationSide;
    readonly body: string;
  }): Promise<MessageEntity> {
    const saved = await this.messageRepository.save(
      this.messageRepository.create({
        conversationId: input.conversationId,
        senderId: input.senderId,
        body: input.body,
      }),
    );
    await this.conversationRepository.update(
      { id: input.conversationId },
      { ...readFlagsAfterSend(input.senderSide), lastMessageAt: saved.sentAt },
    );
    const message = await this.messageRepository.findOne({
      where: { id: saved.id },
      relations: { sender: true },
    });
    return message ?? saved;
  }
}
