// src/core/pagination/pagination.policy.ts
// 列表分页：page/pageSize 窗口、ordering 排序解析与白名单

export type SortDirection = 'ASC' | 'DESC';

export interface SortParam {
  readonly field: string;
  readonly direction: SortDirection;
}

/** 列表请求窗口，page 从 1 开始 */
export interface OffsetParams {
  readonly page: number;
  readonly pageSize: number;
  readonly sorts?: ReadonlyArray<SortParam>;
}

/** 列表响应：items + 总数，前端据 total 计算页数 */
export interface PaginatedResult<T> {
  readonly items: ReadonlyArray<T>;
  readonly total: number;
  readonly page: number;
  readonly pageSize: number;
}

function normalizeDirection(direction: string | undefined): SortDirection {
  const upper = (direction ?? 'ASC').toUpperCase();
  return upper === 'DESC' ? 'DESC' : 'ASC';
}

/**
 * 方向归一化，并按“后者覆盖前者”去重
 */
export function normalizeSorts(
  sorts: ReadonlyArray<SortParam> | undefined,
): ReadonlyArray<SortParam> {
  if (!sorts || sorts.length === 0) return [];
  const normalized = sorts.map((s) => ({
    field: s.field,
    direction: normalizeDirection(s.direction),
  }));
  const seen = new Set<string>();
  const dedup: SortParam[] = [];
  for (let i = normalized.length - 1; i >= 0; i -= 1) {
    const s = normalized[i];
    if (!seen.has(s.field)) {
      seen.add(s.field);
      dedup.push(s);
    }
  }
  return dedup.reverse();
}

/**
 * 解析 `ordering` 查询串，例如 `-date,id`
 * 前导 `-` 表示降序
 */
export function parseOrdering(raw: string | undefined | null): ReadonlyArray<SortParam> {
  if (!raw) return [];
  const sorts: SortParam[] = [];
  for (const part of raw.split(',')) {
    const token = part.trim();
    if (!token || token === '-') continue;
    if (token.startsWith('-')) sorts.push({ field: token.substring(1), direction: 'DESC' });
    else sorts.push({ field: token, direction: 'ASC' });
  }
  return normalizeSorts(sorts);
}

export function enforceMaxPageSize(params: OffsetParams, max: number): OffsetParams {
  if (max <= 0) return params;
  const pageSize = Math.min(Math.max(params.pageSize, 1), max);
  const page = Math.max(params.page, 1);
  return { ...params, pageSize, page };
}

export function applyDefaults(
  params: Partial<OffsetParams>,
  defaults: {
    readonly pageSize?: number;
    readonly sorts?: ReadonlyArray<SortParam>;
  },
): OffsetParams {
  const rawPageSize = params.pageSize ?? defaults.pageSize ?? 20;
  const pageSize = Math.max(Math.trunc(rawPageSize) || 1, 1);
  const rawPage = params.page ?? 1;
  const page = Math.max(Math.trunc(rawPage) || 1, 1);
  const sorts = normalizeSorts(
    params.sorts && params.sorts.length > 0 ? params.sorts : (defaults.sorts ?? []),
  );
  return { pageSize, page, sorts };
}

export function whitelistSorts(
  sorts: ReadonlyArray<SortParam> | undefined,
  allowed: ReadonlyArray<string>,
): ReadonlyArray<SortParam> {
  if (!sorts || sorts.length === 0) return [];
  const allowedSet = new Set(allowed);
  return normalizeSorts(sorts).filter((s) => allowedSet.has(s.field));
}
