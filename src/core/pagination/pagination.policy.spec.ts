// src/core/pagination/pagination.policy.spec.ts
import {
  applyDefaults,
  enforceMaxPageSize,
  parseOrdering,
  whitelistSorts,
} from './pagination.policy';

describe('pagination.policy', () => {
  describe('parseOrdering', () => {
    it('解析逗号分隔与降序前缀', () => {
      expect(parseOrdering('-date, id')).toEqual([
        { field: 'date', direction: 'DESC' },
        { field: 'id', direction: 'ASC' },
      ]);
    });

    it('空串与孤立的 - 被忽略', () => {
      expect(parseOrdering('')).toEqual([]);
      expect(parseOrdering(undefined)).toEqual([]);
      expect(parseOrdering('-,,name')).toEqual([{ field: 'name', direction: 'ASC' }]);
    });

    it('同字段后者覆盖前者', () => {
      expect(parseOrdering('amount,-amount')).toEqual([{ field: 'amount', direction: 'DESC' }]);
    });
  });

  describe('applyDefaults', () => {
    it('缺省 page=1、pageSize 取默认值并使用默认排序', () => {
      expect(
        applyDefaults({}, { pageSize: 20, sorts: [{ field: 'title', direction: 'ASC' }] }),
      ).toEqual({ page: 1, pageSize: 20, sorts: [{ field: 'title', direction: 'ASC' }] });
    });

    it('显式排序优先于默认排序', () => {
      const result = applyDefaults(
        { page: 3, pageSize: 5, sorts: [{ field: 'amount', direction: 'DESC' }] },
        { sorts: [{ field: 'date', direction: 'DESC' }] },
      );
      expect(result).toEqual({
        page: 3,
        pageSize: 5,
        sorts: [{ field: 'amount', direction: 'DESC' }],
      });
    });

    it('非法页码兜底为 1', () => {
      expect(applyDefaults({ page: 0, pageSize: -4 }, {})).toEqual({
        page: 1,
        pageSize: 1,
        sorts: [],
      });
    });
  });

  it('enforceMaxPageSize 截断到上限', () => {
    expect(enforceMaxPageSize({ page: 2, pageSize: 500 }, 100)).toEqual({ page: 2, pageSize: 100 });
  });

  it('whitelistSorts 过滤未授权字段', () => {
    expect(
      whitelistSorts(
        [
          { field: 'password', direction: 'ASC' },
          { field: 'username', direction: 'DESC' },
        ],
        ['id', 'username'],
      ),
    ).toEqual([{ field: 'username', direction: 'DESC' }]);
  });
});
