import 'reflect-metadata';

import { createValidationPipe } from '@core/common/errors/validation.pipe';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { MediaStorageService } from './infrastructure/storage/media-storage.service';

export const API_PREFIX = 'api/v1';

/**
 * 应用程序启动函数
 * 使用 NestJS ConfigService 获取配置信息
 */
async function bootstrap(): Promise<void> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, { bufferLogs: true });

  // 使用 Pino 接管 Nest 内部日志
  const logger = app.get(Logger);
  app.useLogger(logger);

  const configService = app.get<ConfigService>(ConfigService);

  app.setGlobalPrefix(API_PREFIX);
  app.useGlobalPipes(createValidationPipe());

  if (configService.get<boolean>('server.cors.enabled', true)) {
    app.enableCors({
      origin: configService.get<string[]>('server.cors.origins', []),
      credentials: configService.get<boolean>('server.cors.credentials', true),
    });
  }

  // 上传的照片与生成的 PDF
  const { root, prefix } = app.get(MediaStorageService).mount;
  app.useStaticAssets(root, { prefix });

  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('Institute Management API')
      .setVersion('1.0')
      .addBearerAuth()
      .build(),
  );
  SwaggerModule.setup('api/docs', app, document, { jsonDocumentUrl: 'api/schema' });

  const host = configService.get<string>('server.host', '127.0.0.1');
  const port = configService.get<number>('server.port', 3000);
  const nodeEnv = configService.get<string>('NODE_ENV', 'development');

  await app.listen(port, host);

  logger.log(`服务已在 http://${host}:${port}/${API_PREFIX} 以 ${nodeEnv} 模式启动`);
}

void bootstrap();
