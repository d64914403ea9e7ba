// src/types/response.types.ts

/** 前端据此决定提示方式：401 跳转登录，其余弹出错误 */
export enum ShowType {
  ERROR_MESSAGE = 2,
  REDIRECT = 9,
}

/**
 * 所有 JSON 接口的外层结构
 * 失败时 errorCode / errorMessage / showType 必填，data 通常为 null；
 * 证书校验失败、表单字段校验失败会把结构化结果放在 data 中
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T | null;
  errorCode?: string;
  errorMessage?: string;
  showType?: ShowType;
  /** 每次响应生成，错误日志中同样记录 */
  traceId?: string;
  host?: string;
}
