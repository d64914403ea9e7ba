// src/core/config/logger.config.ts
import { ConfigFactory } from '@nestjs/config';
import { IncomingMessage, ServerResponse } from 'http';
import type { LevelWithSilent, TransportMultiOptions, TransportSingleOptions } from 'pino';

/** 4xx 请求附带来源信息，便于排查非法调用 */
export const customPropsFor4xx = (
  req: IncomingMessage,
  res: ServerResponse,
): Record<string, unknown> => {
  const statusCode = res.statusCode ?? 0;
  if (statusCode >= 400 && statusCode < 500) {
    const forwardedRaw = req.headers?.['x-forwarded-for'];
    const xForwardedFor = Array.isArray(forwardedRaw) ? forwardedRaw.join(',') : forwardedRaw;
    const userAgentRaw = req.headers?.['user-agent'];
    const userAgent = Array.isArray(userAgentRaw) ? userAgentRaw.join(',') : userAgentRaw;

    return {
      remoteAddress: req.socket?.remoteAddress ?? null,
      xForwardedFor: xForwardedFor ?? null,
      method: req.method ?? null,
      url: req.url ?? null,
      userAgent: userAgent ?? null,
    };
  }
  return {};
};

/** 请求日志级别：5xx → error，4xx → warn，其余成功请求只在 debug 级别输出 */
export const resolveRequestLogLevel = (
  req: IncomingMessage,
  res: ServerResponse,
  err?: Error,
): LevelWithSilent => {
  if (req.url === '/favicon.ico') return 'silent';
  if (res.statusCode >= 500 || err) return 'error';
  if (res.statusCode >= 400) return 'warn';
  return 'debug';
};

/** 开发环境 pino-pretty，生产环境按级别写入文件 */
export const buildLoggerTransport = (
  isDev: boolean,
  logPath: string,
): TransportSingleOptions | TransportMultiOptions =>
  isDev
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:dd HH:MM:ss',
          messageFormat: '{time} - [{context}] {method} {url} {statusCode} - {msg}',
          ignore: 'hostname,pid,req,context',
        },
      }
    : {
        targets: [
          {
            target: 'pino/file',
            options: { destination: `${logPath}/app.log`, mkdir: true },
            level: 'info',
          },
          {
            target: 'pino/file',
            options: { destination: `${logPath}/error.log`, mkdir: true },
            level: 'error',
          },
        ],
      };

const loggerConfig: ConfigFactory = () => {
  const isDev = process.env.NODE_ENV !== 'production';
  return {
    logger: {
      level: process.env.LOG_LEVEL || (isDev ? 'debug' : 'info'),
      redactFields: ['req.headers.authorization', 'req.body.password', 'req.body.newPassword'],
      isDev,
      path: process.env.LOG_PATH || (isDev ? './logs' : '/var/log/institute'),
    },
  };
};

export default loggerConfig;
