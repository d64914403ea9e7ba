// src/usecases/finance/save-payroll.usecase.ts
import { PayrollBreakdown } from '@app-types/models/finance.types';
import { DomainError, FINANCE_ERROR } from '@core/common/errors/domain-error';
import { MONTH_PATTERN, isNetPayValid } from '@core/finance/finance.policy';
import { TrainerService } from '@modules/course/trainer.service';
import { PayrollEntity } from '@modules/finance/payroll.entity';
import { PayrollService } from '@modules/finance/payroll.service';
import { Injectable } from '@nestjs/common';

export const MONTH_FORMAT_MESSAGE = 'Month must be in YYYY-MM format.';
export const NEGATIVE_NET_PAY_MESSAGE = 'Net pay cannot be negative.';

export interface PayrollInput {
  readonly month: string;
  readonly trainerId: number;
  readonly earnings?: PayrollBreakdown;
  readonly deductions?: PayrollBreakdown;
  readonly netPay: string;
  readonly status?: string;
}

/**
 * 工资单新建与修改
 */
@Injectable()
export class SavePayrollUsecase {
  constructor(
    private readonly payrollService: PayrollService,
    private readonly trainerService: TrainerService,
  ) {}

  async create(input: PayrollInput): Promise<PayrollEntity> {
    await this.validate(input);
    return this.payrollService.create(input);
  }

  async update(id: number, patch: Partial<PayrollInput>): Promise<PayrollEntity> {
    const current = await this.payrollService.getOrThrow(id);
    await this.validate({
      month: patch.month ?? current.month,
      trainerId: patch.trainerId ?? current.trainerId,
      netPay: patch.netPay ?? current.netPay,
    });
    return this.payrollService.update(id, patch);
  }

  private async validate(input: Pick<PayrollInput, 'month' | 'trainerId' | 'netPay'>): Promise<void> {
    if (!MONTH_PATTERN.test(input.month)) {
      throw new DomainError(FINANCE_ERROR.INVALID_MONTH, MONTH_FORMAT_MESSAGE, { month: input.month });
    }
    if (!isNetPayValid(input.netPay)) {
      throw new DomainError(FINANCE_ERROR.NEGATIVE_NET_PAY, NEGATIVE_NET_PAY_MESSAGE, {
        netPay: input.netPay,
      });
    }
    await this.trainerService.getOrThrow(input.trainerId);
  }
}
