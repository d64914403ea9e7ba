// src/core/common/numeric/money.ts
/**
 * 金额与比例的定点计算工具（纯函数，无副作用）
 *
 * - 金额在库中为 DECIMAL(10,2)，经 TypeORM 读出为字符串；统一转为“分”（整数）后再做加减，避免二进制浮点误差
 * - 对外输出时再转回 number（两位小数）或 DECIMAL 字符串
 * - 舍入方式统一为 half-up（远离零）
 */

export type MoneyInput = string | number | null | undefined;

const DECIMAL_PATTERN = /^([+-])?(\d*)(?:\.(\d*))?$/;

/**
 * 将金额转换为整数“分”
 * - 字符串按十进制文本逐位解析，不经过浮点
 * - number 先格式化为定长文本再解析
 * - 空值视为 0
 * @throws RangeError 非法金额文本
 */
export function toCents(value: MoneyInput): number {
  if (value === null || value === undefined || value === '') return 0;
  const text = typeof value === 'number' ? numberToText(value) : value.trim();
  const match = DECIMAL_PATTERN.exec(text);
  if (!match || (match[2] === '' && (match[3] ?? '') === '')) {
    throw new RangeError(`非法金额: ${String(value)}`);
  }
  const sign = match[1] === '-' ? -1 : 1;
  const intPart = match[2] === '' ? 0 : parseInt(match[2], 10);
  const frac = (match[3] ?? '').padEnd(3, '0');
  const twoDigits = parseInt(frac.slice(0, 2), 10);
  const roundDigit = parseInt(frac.charAt(2), 10);
  const cents = intPart * 100 + twoDigits + (roundDigit >= 5 ? 1 : 0);
  return cents === 0 ? 0 : sign * cents;
}

function numberToText(value: number): string {
  if (!Number.isFinite(value)) throw new RangeError(`非法金额: ${value}`);
  // 多保留一位用于 half-up 判定，同时吸收 0.1+0.2 一类的尾差
  return value.toFixed(6);
}

/** “分” → 两位小数 number */
export function fromCents(cents: number): number {
  return cents / 100;
}

/** “分” → DECIMAL 文本，例如 `123456` → `'1234.56'` */
export function formatCents(cents: number): string {
  const sign = cents < 0 ? '-' : '';
  const abs = Math.abs(cents);
  const intPart = Math.floor(abs / 100);
  const frac = String(abs % 100).padStart(2, '0');
  return `${sign}${intPart}.${frac}`;
}

/** 金额求和（返回“分”） */
export function sumCents(values: ReadonlyArray<MoneyInput>): number {
  return values.reduce<number>((acc, v) => acc + toCents(v), 0);
}

/** 将金额规整为两位小数 number，例如 `'1500.5'` → `1500.5` */
export function toMoneyNumber(value: MoneyInput): number {
  return fromCents(toCents(value));
}

/** 将金额规整为 DECIMAL 文本，例如 `1500.5` → `'1500.50'` */
export function toMoneyText(value: MoneyInput): string {
  return formatCents(toCents(value));
}

/**
 * 按 half-up 保留 scale 位小数
 * @param value 任意有限数
 * @param scale 小数位，默认 2
 */
export function roundHalfUp(value: number, scale = 2): number {
  if (!Number.isFinite(value)) return 0;
  const factor = Math.pow(10, scale);
  const shifted = Math.abs(value) * factor;
  // 抵消 1.005 * 100 = 100.49999... 之类的表示误差
  const rounded = Math.floor(shifted + 0.5 + 1e-9);
  const result = (Math.sign(value) * rounded) / factor;
  return result === 0 ? 0 : result;
}

/**
 * 百分比（保留两位），分母为 0 时返回 0
 * @param part 分子
 * @param whole 分母
 */
export function percentage(part: number, whole: number): number {
  if (whole <= 0) return 0;
  return roundHalfUp((part / whole) * 100, 2);
}
