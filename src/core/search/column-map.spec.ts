// src/core/search/column-map.spec.ts
import { columnResolver } from './column-map';

describe('columnResolver', () => {
  const resolve = columnResolver({ date: 'receipt.date', amount: 'receipt.amount' });

  it('返回登记的列名', () => {
    expect(resolve('date')).toBe('receipt.date');
    expect(resolve('amount')).toBe('receipt.amount');
  });

  it('未登记字段与原型链属性返回 null', () => {
    expect(resolve('password')).toBeNull();
    expect(resolve('toString')).toBeNull();
  });
});
