// src/adapters/api/finance/expenses.controller.ts
import type { UsecaseSession } from '@app-types/auth/session.types';
import { AccessRole } from '@app-types/models/account.types';
import { ExpenseService } from '@modules/finance/expense.service';
import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Query,
} from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { currentSession } from '../decorators/current-user.decorator';
import { Roles } from '../decorators/roles.decorator';
import { mapPage, type ListResponse } from '../dto/detail.dto';
import { toSearchParams } from '../dto/list-query.dto';
import { CreateExpenseDto, ExpenseQueryDto, UpdateExpenseDto } from './dto/ledger.dto';
import { toExpenseView, type ExpenseView } from './finance.presenter';

@ApiTags('finance')
@ApiBearerAuth()
@Controller('finance/expenses')
export class ExpensesController {
  constructor(private readonly expenseService: ExpenseService) {}

  @Get()
  async list(@Query() query: ExpenseQueryDto): Promise<ListResponse<ExpenseView>> {
    const page = await this.expenseService.search(
      toSearchParams(query, { category: query.category, date: query.date }),
    );
    return mapPage(page, toExpenseView);
  }

  @Get(':id')
  async get(@Param('id', ParseIntPipe) id: number): Promise<ExpenseView> {
    return toExpenseView(await this.expenseService.getOrThrow(id));
  }

  /** 录入人为当前用户 */
  @Roles(AccessRole.STAFF)
  @Post()
  async create(
    @currentSession() session: UsecaseSession,
    @Body() body: CreateExpenseDto,
  ): Promise<ExpenseView> {
    return toExpenseView(await this.expenseService.create(body, session.accountId));
  }

  @Roles(AccessRole.STAFF)
  @Patch(':id')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() body: UpdateExpenseDto,
  ): Promise<ExpenseView> {
    return toExpenseView(await this.expenseService.update(id, body));
  }

  @Roles(AccessRole.STAFF)
  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseIntPipe) id: number): Promise<void> {
    await this.expenseService.remove(id);
  }
}
