// src/modules/messaging/message.entity.ts
import { UserEntity } from '@modules/account/user.entity';
import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { ConversationEntity } from './conversation.entity';

/**
 * 消息实体
 * 对应数据库表：messages
 */
@Entity('messages')
@Index('idx_messages_conversation_sent', ['conversationId', 'sentAt'])
export class MessageEntity {
  @PrimaryGeneratedColumn({ type: 'int' })
  id!: number;

  @Column({ name: 'conversation_id', type: 'int', comment: '引用 conversations.id' })
  conversationId!: number;

  @ManyToOne(() => ConversationEntity, (conversation) => conversation.messages, {
    onDelete: 'CASCADE',
  })
  @JoinColumn({ name: 'conversation_id' })
  conversation?: ConversationEntity;

  @Column({ name: 'sender_id', type: 'int', comment: '发送人 users.id' })
  senderId!: number;

  @ManyToOne(() => UserEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'sender_id' })
  sender?: UserEntity;

  @Column({ name: 'body', type: 'text', comment: '内容' })
  body!: string;

  @CreateDateColumn({ name: 'sent_at', type: 'timestamp', comment: '发送时间' })
  sentAt!: Date;
}
