// src/adapters/api/dto/detail.dto.ts
import type { PaginatedResult } from '@core/pagination/pagination.policy';

/** 只携带提示信息的响应 */
export interface DetailResponse {
  readonly detail: string;
}

export type ListResponse<T> = PaginatedResult<T>;

/**
 * 将分页结果中的实体逐个映射为响应视图
 */
export function mapPage<E, V>(
  result: PaginatedResult<E>,
  map: (item: E) => V,
): ListResponse<V> {
  return { items: result.items.map(map), total: result.total, page: result.page, pageSize: result.pageSize };
}
