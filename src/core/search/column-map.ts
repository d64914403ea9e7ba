// src/core/search/column-map.ts

/**
 * 由字段 → 列名映射表构造 resolveColumn
 * 未登记的字段一律返回 null（排序时报错，过滤时忽略）
 */
export function columnResolver(
  columns: Readonly<Record<string, string>>,
): (field: string) => string | null {
  return (field: string) =>
    Object.prototype.hasOwnProperty.call(columns, field) ? columns[field] : null;
}
