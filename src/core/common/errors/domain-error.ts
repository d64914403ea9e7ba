// src/core/common/errors/domain-error.ts
// 领域错误与错误码：跨层共享的核心错误定义

/**
 * 领域错误类
 * 用于表示业务逻辑层的错误，可在 Service、Usecase 和 Adapter 层之间传递
 */
export class DomainError extends Error {
  readonly code: string;
  readonly details?: unknown;
  readonly cause?: unknown;

  constructor(code: string, message: string, details?: unknown, cause?: unknown) {
    super(message);
    this.name = 'DomainError';
    this.code = code;
    this.details = details;
    this.cause = cause;

    // 兼容某些编译目标/测试环境的原型链问题，确保 instanceof 正常
    Object.setPrototypeOf(this, new.target.prototype);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DomainError);
    }
  }

  toJSON() {
    return { name: this.name, code: this.code, message: this.message, details: this.details };
  }
}

// 认证相关错误码（登录/刷新/重置密码）
export const AUTH_ERROR = {
  INVALID_CREDENTIALS: 'AUTH_INVALID_CREDENTIALS',
  ACCOUNT_INACTIVE: 'AUTH_ACCOUNT_INACTIVE',
  INVALID_REFRESH_TOKEN: 'AUTH_INVALID_REFRESH_TOKEN',
  INVALID_RESET_TOKEN: 'AUTH_INVALID_RESET_TOKEN',
} as const;
Object.freeze(AUTH_ERROR);

// JWT 相关错误码
export const JWT_ERROR = {
  TOKEN_EXPIRED: 'JWT_TOKEN_EXPIRED',
  TOKEN_INVALID: 'JWT_TOKEN_INVALID',
  TOKEN_NOT_BEFORE: 'JWT_TOKEN_NOT_BEFORE',
  TOKEN_VERIFICATION_FAILED: 'JWT_TOKEN_VERIFICATION_FAILED',
  AUTHENTICATION_FAILED: 'JWT_AUTHENTICATION_FAILED',
  ACCESS_TOKEN_GENERATION_FAILED: 'JWT_ACCESS_TOKEN_GENERATION_FAILED',
  REFRESH_TOKEN_GENERATION_FAILED: 'JWT_REFRESH_TOKEN_GENERATION_FAILED',
  RESET_TOKEN_GENERATION_FAILED: 'JWT_RESET_TOKEN_GENERATION_FAILED',
} as const;
Object.freeze(JWT_ERROR);

// 权限相关错误码
export const PERMISSION_ERROR = {
  INSUFFICIENT_PERMISSIONS: 'PERMISSION_INSUFFICIENT_PERMISSIONS',
  ACCESS_DENIED: 'PERMISSION_ACCESS_DENIED',
  ROLE_REQUIRED: 'PERMISSION_ROLE_REQUIRED',
} as const;
Object.freeze(PERMISSION_ERROR);

// 账户领域错误码（用户/角色/密码策略）
export const ACCOUNT_ERROR = {
  USER_NOT_FOUND: 'ACCOUNT_USER_NOT_FOUND',
  USERNAME_ALREADY_EXISTS: 'ACCOUNT_USERNAME_ALREADY_EXISTS',
  ROLE_NOT_FOUND: 'ACCOUNT_ROLE_NOT_FOUND',
  ROLE_ALREADY_EXISTS: 'ACCOUNT_ROLE_ALREADY_EXISTS',
  PASSWORD_POLICY_VIOLATION: 'ACCOUNT_PASSWORD_POLICY_VIOLATION',
  PASSWORD_REQUIRED: 'ACCOUNT_PASSWORD_REQUIRED',
} as const;
Object.freeze(ACCOUNT_ERROR);

// 分页 / 搜索错误码
export const PAGINATION_ERROR = {
  SORT_FIELD_NOT_ALLOWED: 'PAGINATION_SORT_FIELD_NOT_ALLOWED',
  DB_QUERY_FAILED: 'PAGINATION_DB_QUERY_FAILED',
} as const;
Object.freeze(PAGINATION_ERROR);

// 学员领域错误码（咨询/学员档案/量体）
export const STUDENT_ERROR = {
  STUDENT_NOT_FOUND: 'STUDENT_NOT_FOUND',
  PROFILE_NOT_FOUND: 'STUDENT_PROFILE_NOT_FOUND',
  ENQUIRY_NOT_FOUND: 'STUDENT_ENQUIRY_NOT_FOUND',
  MEASUREMENT_NOT_FOUND: 'STUDENT_MEASUREMENT_NOT_FOUND',
  USER_PAYLOAD_REQUIRED: 'STUDENT_USER_PAYLOAD_REQUIRED',
  ADMISSION_DATE_IN_FUTURE: 'STUDENT_ADMISSION_DATE_IN_FUTURE',
  PHOTO_REQUIRED: 'STUDENT_PHOTO_REQUIRED',
  REG_NO_ALREADY_EXISTS: 'STUDENT_REG_NO_ALREADY_EXISTS',
} as const;
Object.freeze(STUDENT_ERROR);

// 课程领域错误码（课程/讲师/班级/报名）
export const COURSE_ERROR = {
  COURSE_NOT_FOUND: 'COURSE_NOT_FOUND',
  COURSE_CODE_ALREADY_EXISTS: 'COURSE_CODE_ALREADY_EXISTS',
  TRAINER_NOT_FOUND: 'COURSE_TRAINER_NOT_FOUND',
  TRAINER_ALREADY_EXISTS: 'COURSE_TRAINER_ALREADY_EXISTS',
  BATCH_NOT_FOUND: 'COURSE_BATCH_NOT_FOUND',
  BATCH_CODE_ALREADY_EXISTS: 'COURSE_BATCH_CODE_ALREADY_EXISTS',
  INVALID_DATE_RANGE: 'COURSE_INVALID_DATE_RANGE',
  ENROLLMENT_NOT_FOUND: 'COURSE_ENROLLMENT_NOT_FOUND',
  BATCH_CAPACITY_REACHED: 'COURSE_BATCH_CAPACITY_REACHED',
  ENROLLMENT_DUPLICATE: 'COURSE_ENROLLMENT_DUPLICATE',
} as const;
Object.freeze(COURSE_ERROR);

// 考勤领域错误码
export const ATTENDANCE_ERROR = {
  ATTENDANCE_NOT_FOUND: 'ATTENDANCE_NOT_FOUND',
  DUPLICATE_STUDENT_ENTRIES: 'ATTENDANCE_DUPLICATE_STUDENT_ENTRIES',
  INVALID_STATUS: 'ATTENDANCE_INVALID_STATUS',
  ATTENDANCE_DUPLICATE: 'ATTENDANCE_DUPLICATE',
} as const;
Object.freeze(ATTENDANCE_ERROR);

// 财务领域错误码（收据/支出/工资/提醒/库存）
export const FINANCE_ERROR = {
  RECEIPT_NOT_FOUND: 'FINANCE_RECEIPT_NOT_FOUND',
  RECEIPT_LOCKED: 'FINANCE_RECEIPT_LOCKED',
  RECEIPT_NO_ALREADY_EXISTS: 'FINANCE_RECEIPT_NO_ALREADY_EXISTS',
  BATCH_COURSE_MISMATCH: 'FINANCE_BATCH_COURSE_MISMATCH',
  STUDENT_NOT_ENROLLED: 'FINANCE_STUDENT_NOT_ENROLLED',
  NEGATIVE_AMOUNT: 'FINANCE_NEGATIVE_AMOUNT',
  EXPENSE_NOT_FOUND: 'FINANCE_EXPENSE_NOT_FOUND',
  PAYROLL_NOT_FOUND: 'FINANCE_PAYROLL_NOT_FOUND',
  PAYROLL_DUPLICATE: 'FINANCE_PAYROLL_DUPLICATE',
  NEGATIVE_NET_PAY: 'FINANCE_NEGATIVE_NET_PAY',
  INVALID_MONTH: 'FINANCE_INVALID_MONTH',
  REMINDER_NOT_FOUND: 'FINANCE_REMINDER_NOT_FOUND',
  STOCK_ITEM_NOT_FOUND: 'FINANCE_STOCK_ITEM_NOT_FOUND',
  STOCK_ITEM_ALREADY_EXISTS: 'FINANCE_STOCK_ITEM_ALREADY_EXISTS',
  STOCK_TRANSACTION_NOT_FOUND: 'FINANCE_STOCK_TRANSACTION_NOT_FOUND',
  RECEIPT_FORBIDDEN: 'FINANCE_RECEIPT_FORBIDDEN',
  OUTSTANDING_FORBIDDEN: 'FINANCE_OUTSTANDING_FORBIDDEN',
} as const;
Object.freeze(FINANCE_ERROR);

// 证书领域错误码
export const CERTIFICATE_ERROR = {
  CERTIFICATE_NOT_FOUND: 'CERTIFICATE_NOT_FOUND',
  CERTIFICATE_ALREADY_EXISTS: 'CERTIFICATE_ALREADY_EXISTS',
  CERTIFICATE_NO_ALREADY_EXISTS: 'CERTIFICATE_NO_ALREADY_EXISTS',
  COURSE_NOT_COMPLETED: 'CERTIFICATE_COURSE_NOT_COMPLETED',
  NO_ENROLLMENT: 'CERTIFICATE_NO_ENROLLMENT',
  PDF_NOT_FOUND: 'CERTIFICATE_PDF_NOT_FOUND',
  DOWNLOAD_FORBIDDEN: 'CERTIFICATE_DOWNLOAD_FORBIDDEN',
} as const;
Object.freeze(CERTIFICATE_ERROR);

// 站内消息错误码
export const MESSAGING_ERROR = {
  CONVERSATION_NOT_FOUND: 'MESSAGING_CONVERSATION_NOT_FOUND',
} as const;
Object.freeze(MESSAGING_ERROR);

// 活动错误码
export const EVENT_ERROR = {
  EVENT_NOT_FOUND: 'EVENT_NOT_FOUND',
  INVALID_DATE_RANGE: 'EVENT_INVALID_DATE_RANGE',
} as const;
Object.freeze(EVENT_ERROR);

// 通知错误码
export const NOTIFICATION_ERROR = {
  NOTIFICATION_NOT_FOUND: 'NOTIFICATION_NOT_FOUND',
  TARGET_REQUIRED: 'NOTIFICATION_TARGET_REQUIRED',
  ROLE_NOT_FOUND: 'NOTIFICATION_ROLE_NOT_FOUND',
  NO_TARGET_USERS: 'NOTIFICATION_NO_TARGET_USERS',
} as const;
Object.freeze(NOTIFICATION_ERROR);

// 类型辅助
export type AuthErrorCode = (typeof AUTH_ERROR)[keyof typeof AUTH_ERROR];
export type JwtErrorCode = (typeof JWT_ERROR)[keyof typeof JWT_ERROR];
export type PermissionErrorCode = (typeof PERMISSION_ERROR)[keyof typeof PERMISSION_ERROR];
export type AccountErrorCode = (typeof ACCOUNT_ERROR)[keyof typeof ACCOUNT_ERROR];
export type FinanceErrorCode = (typeof FINANCE_ERROR)[keyof typeof FINANCE_ERROR];
export type CertificateErrorCode = (typeof CERTIFICATE_ERROR)[keyof typeof CERTIFICATE_ERROR];

// 类型守卫：统一判断是否为领域错误（兼容多包/反序列化场景）
export const isDomainError = (error: unknown): error is DomainError => {
  if (error instanceof DomainError) return true;
  if (!error || typeof error !== 'object') return false;
  return (
    'name' in error && error.name === 'DomainError' && 'code' in error && typeof error.code === 'string'
  );
};
