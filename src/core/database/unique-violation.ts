// src/core/database/unique-violation.ts

/**
 * 检测是否为唯一约束冲突错误（MySQL）
 * - code=ER_DUP_ENTRY / errno=1062 / sqlState=23000
 * - 同时兼容 TypeORM QueryFailedError 包装的 driverError
 */
export function isUniqueConstraintViolation(error: unknown): boolean {
  if (!error || typeof error !== 'object') return false;
  const driver =
    'driverError' in error && error.driverError && typeof error.driverError === 'object'
      ? error.driverError
      : error;
  const code = 'code' in driver ? driver.code : undefined;
  const errno = 'errno' in driver ? driver.errno : undefined;
  const sqlState = 'sqlState' in driver ? driver.sqlState : undefined;
  return code === 'ER_DUP_ENTRY' || errno === 1062 || sqlState === '23000';
}
