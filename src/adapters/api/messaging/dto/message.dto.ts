// src/adapters/api/messaging/dto/message.dto.ts
import { IsNotEmpty, IsString } from 'class-validator';

export class SendMessageDto {
  @IsString({ message: 'body must be a string.' })
  @IsNotEmpty({ message: 'body may not be blank.' })
  body!: string;
}
