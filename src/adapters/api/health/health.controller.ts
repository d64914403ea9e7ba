// src/adapters/api/health/health.controller.ts
import { Controller, Get } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { Public } from '../decorators/public.decorator';

export const HEALTH_MESSAGE = 'Institute Management API is running';

@ApiTags('health')
@Controller('health')
export class HealthController {
  @Public()
  @Get()
  check(): { status: 'ok'; time: string; message: string } {
    return { status: 'ok', time: new Date().toISOString(), message: HEALTH_MESSAGE };
  }
}
