// src/usecases/messaging/messaging-usecases.module.ts
import { MessagingServiceModule } from '@modules/messaging/messaging-service.module';
import { StudentServiceModule } from '@modules/student/student-service.module';
import { Module } from '@nestjs/common';
import { ConversationUsecase } from './conversation.usecase';

@Module({
  imports: [MessagingServiceModule, StudentServiceModule],
  providers: [ConversationUsecase],
  exports: [ConversationUsecase],
})
export class MessagingUsecasesModule {}
