// src/modules/common/search.module.ts
// 顶层可复用 Search 模块：绑定 TypeORM 搜索实现并导出服务

import type { SearchOptions, SearchParams, SearchResult } from '@core/search/search.types';
import { Global, Injectable, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmSearch } from '@src/infrastructure/typeorm/search/typeorm-search';
import type { ObjectLiteral, SelectQueryBuilder } from 'typeorm';

/**
 * SearchService：列表查询统一入口
 * - 页大小默认值与上限取自 pagination 配置
 */
@Injectable()
export class SearchService {
  private readonly engine: TypeOrmSearch;

  constructor(config: ConfigService) {
    this.engine = new TypeOrmSearch({
      defaultPageSize: config.get<number>('pagination.defaultPageSize', 20),
      maxPageSize: config.get<number>('pagination.maxPageSize', 100),
    });
  }

  async search<T extends ObjectLiteral>(input: {
    readonly qb: SelectQueryBuilder<T>;
    readonly params: SearchParams;
    readonly options: SearchOptions;
  }): Promise<SearchResult<T>> {
    return this.engine.search<T>(input);
  }
}

@Global()
@Module({
  providers: [SearchService],
  exports: [SearchService],
})
export class SearchModule {}
