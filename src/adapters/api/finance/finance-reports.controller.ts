// src/adapters/api/finance/finance-reports.controller.ts
import type { UsecaseSession } from '@app-types/auth/session.types';
import { AccessRole } from '@app-types/models/account.types';
import { Controller, Get, HttpCode, HttpStatus, Param, ParseIntPipe, Post } from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { CheckOverdueFeesJob } from '@usecases/finance/check-overdue-fees.job';
import {
  FinanceAnalyticsUsecase,
  type CourseIncome,
  type FinanceSummary,
  type MonthlyFinance,
  type TrainerPayrollSummary,
} from '@usecases/finance/finance-analytics.usecase';
import {
  OutstandingUsecase,
  type BatchOutstanding,
  type CourseOutstanding,
  type OverallOutstanding,
  type StudentOutstanding,
} from '@usecases/finance/outstanding.usecase';
import { currentSession } from '../decorators/current-user.decorator';
import { Roles } from '../decorators/roles.decorator';
import type { DetailResponse } from '../dto/detail.dto';

/** 收支汇表（员工） */
@ApiTags('finance')
@ApiBearerAuth()
@Roles(AccessRole.STAFF)
@Controller('finance/analytics')
export class FinanceAnalyticsController {
  constructor(private readonly analytics: FinanceAnalyticsUsecase) {}

  @Get('summary')
  async summary(): Promise<FinanceSummary> {
    return this.analytics.summary();
  }

  @Get('income-expense')
  async incomeExpense(): Promise<MonthlyFinance[]> {
    return this.analytics.incomeExpense();
  }

  @Get('course/:id')
  async course(@Param('id', ParseIntPipe) id: number): Promise<CourseIncome> {
    return this.analytics.course(id);
  }

  @Get('trainer/:id')
  async trainer(@Param('id', ParseIntPipe) id: number): Promise<TrainerPayrollSummary> {
    return this.analytics.trainer(id);
  }
}

/** 欠费查询：学员维度由用例判断本人或管理员，其余需员工 */
@ApiTags('finance')
@ApiBearerAuth()
@Controller('finance/outstanding')
export class OutstandingController {
  constructor(private readonly outstanding: OutstandingUsecase) {}

  @Get('student/:id')
  async student(
    @currentSession() session: UsecaseSession,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<StudentOutstanding> {
    return this.outstanding.student(session, id);
  }

  @Roles(AccessRole.STAFF)
  @Get('batch/:id')
  async batch(@Param('id', ParseIntPipe) id: number): Promise<BatchOutstanding> {
    return this.outstanding.batch(id);
  }

  @Roles(AccessRole.STAFF)
  @Get('course/:id')
  async course(@Param('id', ParseIntPipe) id: number): Promise<CourseOutstanding> {
    return this.outstanding.course(id);
  }

  @Roles(AccessRole.STAFF)
  @Get('overall')
  async overall(): Promise<OverallOutstanding> {
    return this.outstanding.overall();
  }
}

@ApiTags('finance')
@ApiBearerAuth()
@Roles(AccessRole.ADMIN)
@Controller('finance/jobs')
export class FinanceJobsController {
  constructor(private readonly checkOverdueFeesJob: CheckOverdueFeesJob) {}

  /** 手动触发逾期检查，与每日定时任务一致 */
  @Post('check-overdue')
  @HttpCode(HttpStatus.OK)
  async checkOverdue(): Promise<DetailResponse> {
    return this.checkOverdueFeesJob.run();
  }
}
