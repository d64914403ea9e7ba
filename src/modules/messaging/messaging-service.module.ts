// src/modules/messaging/messaging-service.module.ts
import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConversationEntity } from './conversation.entity';
import { MessageEntity } from './message.entity';
import { MessagingService } from './messaging.service';

@Module({
  imports: [TypeOrmModule.forFeature([ConversationEntity, MessageEntity])],
  providers: [MessagingService],
  exports: [TypeOrmModule, MessagingService],
})
export class MessagingServiceModule {}
