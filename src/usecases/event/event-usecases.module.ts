// src/usecases/event/event-usecases.module.ts
import { EventServiceModule } from '@modules/event/event-service.module';
import { Module } from '@nestjs/common';
import { SaveEventUsecase } from './save-event.usecase';

@Module({
  imports: [EventServiceModule],
  providers: [SaveEventUsecase],
  exports: [SaveEventUsecase],
})
export class EventUsecasesModule {}
