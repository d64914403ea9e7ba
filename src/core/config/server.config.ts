// src/core/config/server.config.ts
import { ConfigFactory } from '@nestjs/config';

const DEFAULT_CORS_ORIGINS = 'http://localhost:5173,http://127.0.0.1:5173';

/**
 * 解析逗号分隔的来源列表
 * @param raw 原始环境变量
 */
export function parseOrigins(raw: string | undefined): string[] {
  return (raw || DEFAULT_CORS_ORIGINS)
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

const serverConfig: ConfigFactory = () => {
  const origins = parseOrigins(process.env.APP_CORS_ORIGINS);
  return {
    server: {
      host: process.env.APP_HOST || '127.0.0.1',
      port: parseInt(process.env.APP_PORT || '3000', 10),
      cors: {
        enabled: process.env.APP_CORS_ENABLED !== 'false',
        origins,
        credentials: process.env.APP_CORS_CREDENTIALS !== 'false',
      },
      // 前端地址：证书校验链接、重置密码链接均以此为前缀；默认取第一个 CORS 来源
      frontendUrl: process.env.APP_FRONTEND_URL || origins[0] || 'http://localhost:5173',
    },
  };
};

export default serverConfig;
