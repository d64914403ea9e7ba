// src/core/common/errors/error-status.ts
// 领域错误码 → HTTP 状态码

import { HttpStatus } from '@nestjs/common';
import {
  AUTH_ERROR,
  CERTIFICATE_ERROR,
  FINANCE_ERROR,
  JWT_ERROR,
  PAGINATION_ERROR,
  PERMISSION_ERROR,
} from './domain-error';

const UNAUTHORIZED_CODES: ReadonlySet<string> = new Set<string>([
  ...Object.values(AUTH_ERROR).filter((code) => code !== AUTH_ERROR.INVALID_RESET_TOKEN),
  JWT_ERROR.TOKEN_EXPIRED,
  JWT_ERROR.TOKEN_INVALID,
  JWT_ERROR.TOKEN_NOT_BEFORE,
  JWT_ERROR.TOKEN_VERIFICATION_FAILED,
  JWT_ERROR.AUTHENTICATION_FAILED,
]);

const FORBIDDEN_CODES: ReadonlySet<string> = new Set<string>([
  ...Object.values(PERMISSION_ERROR),
  CERTIFICATE_ERROR.DOWNLOAD_FORBIDDEN,
  FINANCE_ERROR.RECEIPT_FORBIDDEN,
  FINANCE_ERROR.OUTSTANDING_FORBIDDEN,
]);

const INTERNAL_CODES: ReadonlySet<string> = new Set<string>([
  JWT_ERROR.ACCESS_TOKEN_GENERATION_FAILED,
  JWT_ERROR.REFRESH_TOKEN_GENERATION_FAILED,
  JWT_ERROR.RESET_TOKEN_GENERATION_FAILED,
  PAGINATION_ERROR.DB_QUERY_FAILED,
]);

/**
 * 按错误码解析 HTTP 状态
 * - 显式集合优先
 * - 其次按后缀：`_NOT_FOUND` → 404，`_ALREADY_EXISTS` / `_DUPLICATE` → 409
 * - 其余视为输入问题 → 400
 */
export function resolveHttpStatus(code: string): HttpStatus {
  if (UNAUTHORIZED_CODES.has(code)) return HttpStatus.UNAUTHORIZED;
  if (FORBIDDEN_CODES.has(code)) return HttpStatus.FORBIDDEN;
  if (INTERNAL_CODES.has(code)) return HttpStatus.INTERNAL_SERVER_ERROR;
  if (code.endsWith('_NOT_FOUND')) return HttpStatus.NOT_FOUND;
  if (code.endsWith('_ALREADY_EXISTS') || code.endsWith('_DUPLICATE')) return HttpStatus.CONFLICT;
  return HttpStatus.BAD_REQUEST;
}
