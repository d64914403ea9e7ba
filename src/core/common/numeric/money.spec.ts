// src/core/common/numeric/money.spec.ts
import {
  formatCents,
  percentage,
  roundHalfUp,
  sumCents,
  toCents,
  toMoneyNumber,
  toMoneyText,
} from '@core/common/numeric/money';

describe('toCents：金额文本转“分”', () => {
  it('解析 DECIMAL 字符串', () => {
    expect(toCents('1500.00')).toBe(150000);
    expect(toCents('0.05')).toBe(5);
    expect(toCents('12.3')).toBe(1230);
    expect(toCents('-7.25')).toBe(-725);
  });

  it('第三位小数按 half-up 进位', () => {
    expect(toCents('1.005')).toBe(101);
    expect(toCents('1.004')).toBe(100);
  });

  it('number 输入不受二进制浮点尾差影响', () => {
    expect(toCents(0.1 + 0.2)).toBe(30);
    expect(toCents(19.99)).toBe(1999);
  });

  it('空值视为 0', () => {
    expect(toCents(null)).toBe(0);
    expect(toCents(undefined)).toBe(0);
    expect(toCents('')).toBe(0);
  });

  it('非法文本抛出 RangeError', () => {
    expect(() => toCents('abc')).toThrow(RangeError);
    expect(() => toCents('.')).toThrow(RangeError);
  });
});

describe('金额格式化与求和', () => {
  it('formatCents 输出两位小数文本', () => {
    expect(formatCents(123456)).toBe('1234.56');
    expect(formatCents(5)).toBe('0.05');
    expect(formatCents(-725)).toBe('-7.25');
  });

  it('sumCents 逐项精确累加', () => {
    expect(sumCents(['0.10', '0.20', 0.3])).toBe(60);
  });

  it('toMoneyNumber / toMoneyText 规整两位小数', () => {
    expect(toMoneyNumber('1500.5')).toBe(1500.5);
    expect(toMoneyText(1500.5)).toBe('1500.50');
  });
});

describe('roundHalfUp / percentage', () => {
  it('half-up 保留两位', () => {
    expect(roundHalfUp(66.666666)).toBe(66.67);
    expect(roundHalfUp(1.005)).toBe(1.01);
    expect(roundHalfUp(-2.345)).toBe(-2.35);
  });

  it('百分比分母为 0 时返回 0', () => {
    expect(percentage(2, 3)).toBe(66.67);
    expect(percentage(5, 0)).toBe(0);
    expect(percentage(4, 4)).toBe(100);
  });
});
