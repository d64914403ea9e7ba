// src/adapters/api/dto/list-query.dto.ts
import { parseOrdering } from '@core/pagination/pagination.policy';
import type { OffsetParams } from '@core/pagination/pagination.policy';
import type { FilterValue, SearchParams } from '@core/search/search.types';
import { Transform, Type } from 'class-transformer';
import { IsBoolean, IsInt, IsOptional, IsString, Max, Min } from 'class-validator';

/**
 * 查询串布尔值：仅接受 true/false/1/0，其余原样交给校验器报错
 */
export const QueryBoolean = (): PropertyDecorator =>
  Transform(({ value }: { value: unknown }) => {
    if (value === 'true' || value === '1' || value === true) return true;
    if (value === 'false' || value === '0' || value === false) return false;
    return value;
  });

/**
 * 列表查询参数
 * - page / pageSize：Offset 分页
 * - search：文本搜索
 * - ordering：逗号分隔，前导 `-` 表示降序
 */
export class ListQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'page must be an integer.' })
  @Min(1, { message: 'page must be at least 1.' })
  page?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt({ message: 'pageSize must be an integer.' })
  @Min(1, { message: 'pageSize must be at least 1.' })
  @Max(100, { message: 'pageSize must not exceed 100.' })
  pageSize?: number;

  @IsOptional()
  @IsString()
  search?: string;

  @IsOptional()
  @IsString()
  ordering?: string;
}

/** 仅分页（无搜索/过滤的嵌套资源） */
export function toPagination(query: ListQueryDto): Partial<OffsetParams> {
  return { page: query.page, pageSize: query.pageSize, sorts: parseOrdering(query.ordering) };
}

/**
 * 查询 DTO → SearchParams
 * filters 中值为 undefined 的键会被搜索引擎跳过
 */
export function toSearchParams(
  query: ListQueryDto,
  filters: Readonly<Record<string, FilterValue | undefined>> = {},
): SearchParams {
  return { query: query.search, filters, pagination: toPagination(query) };
}

/** 常用的启用状态过滤 */
export class ActiveFilterQueryDto extends ListQueryDto {
  @IsOptional()
  @QueryBoolean()
  @IsBoolean({ message: 'active must be a boolean.' })
  active?: boolean;
}
