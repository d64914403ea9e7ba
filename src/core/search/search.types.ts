// src/core/search/search.types.ts
// 纯类型定义：搜索参数与结果类型，零依赖、零副作用

import type { OffsetParams, PaginatedResult, SortParam } from '@core/pagination/pagination.policy';

export type FilterValue = string | number | boolean;

/**
 * 文本搜索参数
 * - query 为可选的文本查询词
 * - filters 为可选的键值过滤条件（需结合白名单解析）
 */
export interface SearchParams {
  readonly query?: string;
  readonly filters?: Readonly<Record<string, FilterValue | undefined>>;
  readonly pagination: Partial<OffsetParams>;
}

/**
 * 搜索选项
 * - searchColumns：参与文本搜索的安全列名（含别名）
 * - resolveColumn：业务字段到安全列名的解析函数，排序与过滤共用
 */
export interface SearchOptions {
  readonly searchColumns: ReadonlyArray<string>;
  readonly allowedFilters?: ReadonlyArray<string>;
  readonly resolveColumn: (field: string) => string | null;
  /** 最小搜索词长度，默认 1 */
  readonly minQueryLength?: number;
  /** 排序白名单（业务字段名），列名由 resolveColumn 映射 */
  readonly allowedSorts: ReadonlyArray<string>;
  readonly defaultSorts: ReadonlyArray<SortParam>;
  /**
   * 自定义过滤子句，返回 null 时回退为等值匹配
   * 用于计算字段（如 needsReorder）或区间条件
   */
  readonly buildFilter?: (args: {
    readonly field: string;
    readonly column: string;
    readonly value: FilterValue;
  }) => { clause: string; params?: Record<string, unknown> } | null;
}

export type SearchResult<T> = PaginatedResult<T>;
