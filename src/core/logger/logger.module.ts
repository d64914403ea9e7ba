// src/core/logger/logger.module.ts
import {
  buildLoggerTransport,
  customPropsFor4xx,
  resolveRequestLogLevel,
} from '@core/config/logger.config';
import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { LoggerModule as PinoLoggerModule } from 'nestjs-pino';

@Module({
  imports: [
    ConfigModule,
    PinoLoggerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const isDev = configService.get<boolean>('logger.isDev', true);
        const logPath = configService.get<string>('logger.path', './logs');
        return {
          pinoHttp: {
            level: configService.get<string>('logger.level', 'info'),
            transport: buildLoggerTransport(isDev, logPath),
            redact: configService.get<string[]>('logger.redactFields', []),
            customProps: customPropsFor4xx,
            customLogLevel: resolveRequestLogLevel,
          },
        };
      },
    }),
  ],
})
export class LoggerModule {}
