// src/core/common/numeric/sequence.ts

/**
 * 按前缀续号：取已用最大编号的尾部序号 +1，左补零到 width 位
 * 删除记录后不会复用仍然存在的编号
 */
export function nextSequenceNo(prefix: string, lastNo: string | null, width: number): string {
  const tail = lastNo?.startsWith(prefix) ? lastNo.substring(prefix.length) : '';
  const last = /^\d+$/.test(tail) ? Number(tail) : 0;
  return `${prefix}${String(last + 1).padStart(width, '0')}`;
}
