// src/core/middleware/format-response.middleware.ts

import { ApiResponse, ShowType } from '@app-types/response.types';
import { generateTraceId } from '@core/common/filters/http-exception.filter';
import { Injectable, NestMiddleware } from '@nestjs/common';
import { NextFunction, Request, Response } from 'express';
import { PinoLogger } from 'nestjs-pino';

/**
 * HTTP 响应格式化中间件
 * 拦截 res.json 方法，只对 JSON 响应进行格式化；文件下载等二进制响应不受影响
 */
@Injectable()
export class FormatResponseMiddleware implements NestMiddleware {
  constructor(private readonly logger: PinoLogger) {
    this.logger.setContext(FormatResponseMiddleware.name);
  }

  use(req: Request, res: Response, next: NextFunction): void {
    const originalJson = res.json.bind(res);
    res.json = (body: unknown): Response => {
      try {
        return originalJson(formatBody(body, res.statusCode, req.headers.host || 'unknown'));
      } catch (error) {
        this.logger.error(
          {
            error: error instanceof Error ? error.message : String(error),
            path: req.url,
            method: req.method,
          },
          '响应格式化过程中发生错误',
        );
        return originalJson(body);
      }
    };
    next();
  }
}

/**
 * 格式化响应体
 * - 已经是 envelope（异常过滤器产出）时原样返回
 * - 4xx/5xx 且控制器自行返回的结构化结果：放入 data，并提取 message / detail 作为错误信息
 * - 其余视为成功响应
 */
export function formatBody(body: unknown, statusCode: number, host: string): ApiResponse<unknown> {
  if (isApiResponse(body)) return body;

  const traceId = generateTraceId();
  if (statusCode >= 400) {
    return {
      success: false,
      data: body,
      errorCode: `HTTP_${statusCode}`,
      errorMessage: pickMessage(body) ?? 'Request failed',
      showType: ShowType.ERROR_MESSAGE,
      traceId,
      host,
    };
  }

  return {
    success: true,
    data: body,
    traceId,
    host,
  };
}

function isApiResponse(body: unknown): body is ApiResponse<unknown> {
  return (
    typeof body === 'object' &&
    body !== null &&
    'success' in body &&
    typeof body.success === 'boolean' &&
    'traceId' in body &&
    typeof body.traceId === 'string'
  );
}

function pickMessage(body: unknown): string | undefined {
  if (typeof body !== 'object' || body === null) return undefined;
  if ('message' in body && typeof body.message === 'string') return body.message;
  if ('detail' in body && typeof body.detail === 'string') return body.detail;
  return undefined;
}
