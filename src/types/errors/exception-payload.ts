// src/types/errors/exception-payload.ts

/** 从 HttpException 响应体中提取出的错误信息 */
export interface ExceptionPayload {
  /** 业务细分码 */
  errorCode?: string;
  /** 业务可读消息 */
  errorMessage?: string;
}
