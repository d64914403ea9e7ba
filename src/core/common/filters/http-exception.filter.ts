// src/core/common/filters/http-exception.filter.ts
import { ExceptionPayload } from '@app-types/errors/exception-payload';
import { ApiResponse, ShowType } from '@app-types/response.types';
import { DomainError, isDomainError, resolveHttpStatus } from '@core/common/errors';
import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Injectable,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { PinoLogger } from 'nestjs-pino';

export const INTERNAL_ERROR_MESSAGE = 'An unexpected internal server error occurred.';

/** 将 HTTP 状态码映射为通用错误大类（DomainError 之外的异常使用） */
function mapStatusToErrorCode(status: number): string {
  switch (status) {
    case 400:
    case 422:
      return 'BAD_REQUEST';
    case 401:
      return 'UNAUTHENTICATED';
    case 403:
      return 'FORBIDDEN';
    case 404:
      return 'NOT_FOUND';
    case 405:
      return 'METHOD_NOT_ALLOWED';
    case 409:
      return 'CONFLICT';
    case 413:
      return 'PAYLOAD_TOO_LARGE';
    default:
      return status >= 500 ? 'INTERNAL_ERROR' : `HTTP_${status}`;
  }
}

/** 从异常响应中提取错误信息 */
function extractPayload(resp: string | object): ExceptionPayload {
  if (typeof resp === 'string') {
    return { errorMessage: resp };
  }
  const errorCode =
    'errorCode' in resp && typeof resp.errorCode === 'string' ? resp.errorCode : undefined;
  if ('errorMessage' in resp && typeof resp.errorMessage === 'string') {
    return { errorCode, errorMessage: resp.errorMessage };
  }
  const msg = 'message' in resp ? resp.message : undefined;
  if (Array.isArray(msg)) return { errorCode, errorMessage: msg.map(String).join('; ') };
  if (typeof msg === 'string') return { errorCode, errorMessage: msg };
  return { errorCode };
}

/**
 * HTTP 全局异常过滤器
 * - DomainError：按错误码解析状态，消息原样返回给调用方
 * - HttpException：保留其状态码与消息
 * - 其余异常：记录日志，统一返回 500 与通用消息
 * 响应体直接输出为统一 envelope，FormatResponseMiddleware 识别后不再二次包装
 */
@Catch()
@Injectable()
export class HttpExceptionsFilter implements ExceptionFilter {
  constructor(private readonly logger: PinoLogger) {
    this.logger.setContext(HttpExceptionsFilter.name);
  }

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const req = ctx.getRequest<Request>();
    const res = ctx.getResponse<Response>();

    const { status, body } = this.buildEnvelope(exception, req);

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        {
          path: req.url,
          method: req.method,
          traceId: body.traceId,
          error: exception instanceof Error ? exception.message : String(exception),
          stack: exception instanceof Error ? exception.stack : undefined,
        },
        '请求处理发生未预期异常',
      );
    }

    if (res.headersSent) return;
    res.status(status).json(body);
  }

  /**
   * 构造错误响应 envelope
   * @returns 状态码与响应体
   */
  buildEnvelope(exception: unknown, req: Request): { status: number; body: ApiResponse<unknown> } {
    const base = {
      success: false,
      traceId: generateTraceId(),
      host: req.headers.host || 'unknown',
    };

    if (isDomainError(exception)) {
      return this.fromDomainError(exception, base);
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const { errorCode, errorMessage } = extractPayload(exception.getResponse());
      return {
        status,
        body: {
          ...base,
          data: null,
          errorCode: errorCode ?? mapStatusToErrorCode(status),
          errorMessage: errorMessage ?? exception.message,
          showType: ShowType.ERROR_MESSAGE,
        },
      };
    }

    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      body: {
        ...base,
        data: null,
        errorCode: 'INTERNAL_ERROR',
        errorMessage: INTERNAL_ERROR_MESSAGE,
        showType: ShowType.ERROR_MESSAGE,
      },
    };
  }

  private fromDomainError(
    exception: DomainError,
    base: { success: boolean; traceId: string; host: string },
  ): { status: number; body: ApiResponse<unknown> } {
    const status = resolveHttpStatus(exception.code);
    // 5xx 级别的领域错误不向外暴露内部细节
    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      return {
        status,
        body: {
          ...base,
          data: null,
          errorCode: exception.code,
          errorMessage: INTERNAL_ERROR_MESSAGE,
          showType: ShowType.ERROR_MESSAGE,
        },
      };
    }
    return {
      status,
      body: {
        ...base,
        data: null,
        errorCode: exception.code,
        errorMessage: exception.message,
        showType:
          status === HttpStatus.UNAUTHORIZED ? ShowType.REDIRECT : ShowType.ERROR_MESSAGE,
      },
    };
  }
}

/**
 * 生成追踪 ID
 */
export function generateTraceId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 11)}`;
}
