// src/infrastructure/typeorm/search/typeorm-search.ts
// TypeORM 搜索实现：文本搜索 + 白名单过滤 + 排序 + Offset 分页

import { DomainError, PAGINATION_ERROR } from '@core/common/errors/domain-error';
import {
  applyDefaults,
  enforceMaxPageSize,
  whitelistSorts,
} from '@core/pagination/pagination.policy';
import type { SortParam } from '@core/pagination/pagination.policy';
import type {
  FilterValue,
  SearchOptions,
  SearchParams,
  SearchResult,
} from '@core/search/search.types';
import { Brackets, type ObjectLiteral, type SelectQueryBuilder } from 'typeorm';

/**
 * TypeORM 搜索引擎
 * - 进入时克隆调用方的 QueryBuilder，避免副作用污染
 * - 排序与过滤字段必须经 resolveColumn 映射，禁止直接使用原始列名
 */
export class TypeOrmSearch {
  constructor(
    private readonly limits: { readonly defaultPageSize: number; readonly maxPageSize: number } = {
      defaultPageSize: 20,
      maxPageSize: 100,
    },
  ) {}

  async search<T extends ObjectLiteral>(input: {
    readonly qb: SelectQueryBuilder<T>;
    readonly params: SearchParams;
    readonly options: SearchOptions;
  }): Promise<SearchResult<T>> {
    const qb = input.qb.clone();
    const { params, options } = input;

    try {
      this.applyTextSearch(qb, params.query, options);
      this.applyFilters(qb, params.filters, options);

      const normalized = enforceMaxPageSize(
        applyDefaults(params.pagination, {
          pageSize: this.limits.defaultPageSize,
          sorts: options.defaultSorts,
        }),
        this.limits.maxPageSize,
      );
      const safeSorts = whitelistSorts(normalized.sorts, options.allowedSorts);
      this.applySorting(qb, safeSorts.length ? safeSorts : options.defaultSorts, options);

      const { page, pageSize } = normalized;
      const [items, total] = await qb
        .skip((page - 1) * pageSize)
        .take(pageSize)
        .getManyAndCount();

      return { items, total, page, pageSize };
    } catch (error) {
      if (error instanceof DomainError) throw error;
      throw new DomainError(
        PAGINATION_ERROR.DB_QUERY_FAILED,
        'Search query failed.',
        { error: error instanceof Error ? error.message : '未知错误' },
        error,
      );
    }
  }

  /**
   * 文本搜索：任一列 LIKE 命中
   */
  private applyTextSearch<T extends ObjectLiteral>(
    qb: SelectQueryBuilder<T>,
    query: string | undefined,
    options: SearchOptions,
  ): void {
    if (!query || options.searchColumns.length === 0) return;

    // 最小查询长度短路，避免 LIKE '%%'
    const min = options.minQueryLength ?? 1;
    const trimmed = query.trim();
    if (trimmed.length < min) return;

    const escaped = trimmed.replace(/\\/g, '\\\\').replace(/%/g, '\\%').replace(/_/g, '\\_');
    const like = `%${escaped}%`;

    qb.andWhere(
      new Brackets((inner) => {
        options.searchColumns.forEach((col, idx) => {
          const clause = `LOWER(${col}) LIKE LOWER(:q) ESCAPE '\\\\'`;
          if (idx === 0) inner.where(clause);
          else inner.orWhere(clause);
        });
      }),
      { q: like },
    );
  }

  /**
   * 过滤条件：白名单字段映射到安全列，支持 buildFilter 钩子
   */
  private applyFilters<T extends ObjectLiteral>(
    qb: SelectQueryBuilder<T>,
    filters: Readonly<Record<string, FilterValue | undefined>> | undefined,
    options: SearchOptions,
  ): void {
    if (!filters || !options.allowedFilters || options.allowedFilters.length === 0) return;

    const allowed = new Set(options.allowedFilters);
    for (const [field, value] of Object.entries(filters)) {
      if (value === undefined || !allowed.has(field)) continue;
      const column = options.resolveColumn(field);
      if (!column) continue;

      if (options.buildFilter) {
        const custom = options.buildFilter({ field, column, value });
        if (custom) {
          qb.andWhere(custom.clause, custom.params);
          continue;
        }
      }

      const paramKey = `f_${field}`;
      qb.andWhere(`${column} = :${paramKey}`, { [paramKey]: value });
    }
  }

  private applySorting<T extends ObjectLiteral>(
    qb: SelectQueryBuilder<T>,
    sorts: ReadonlyArray<SortParam>,
    options: SearchOptions,
  ): void {
    sorts.forEach((s, idx) => {
      const col = options.resolveColumn(s.field);
      if (!col) {
        throw new DomainError(
          PAGINATION_ERROR.SORT_FIELD_NOT_ALLOWED,
          `Ordering field is not allowed: ${s.field}`,
        );
      }
      if (idx === 0) qb.orderBy(col, s.direction);
      else qb.addOrderBy(col, s.direction);
    });
  }
}
