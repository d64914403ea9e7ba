// src/types/models/audit.types.ts

/** 历史记录类型：+ 新增，~ 修改，- 删除 */
export enum HistoryType {
  CREATED = '+',
  CHANGED = '~',
  DELETED = '-',
}

export type AuditSnapshot = Record<string, string | number | boolean | null>;
