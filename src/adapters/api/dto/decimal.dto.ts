// src/adapters/api/dto/decimal.dto.ts
import { applyDecorators } from '@nestjs/common';
import { Transform } from 'class-transformer';
import { Matches } from 'class-validator';

/**
 * 定点小数字段（DECIMAL 列以字符串存取）
 * 接受数字或字符串，统一转为字符串后按位数校验
 */
export function DecimalString(options: {
  readonly field: string;
  readonly places?: number;
  readonly signed?: boolean;
}): PropertyDecorator {
  const places = options.places ?? 2;
  const sign = options.signed ? '-?' : '';
  const pattern = new RegExp(`^${sign}\\d+(\\.\\d{1,${places}})?$`);
  return applyDecorators(
    Transform(({ value }: { value: unknown }) => (typeof value === 'number' ? String(value) : value)),
    Matches(pattern, {
      message: options.signed
        ? `${options.field} must be a number with at most ${places} decimal places.`
        : `${options.field} must be a non-negative number with at most ${places} decimal places.`,
    }),
  );
}
