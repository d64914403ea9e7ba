// src/adapters/api/finance/stock.controller.ts
import type { UsecaseSession } from '@app-types/auth/session.types';
import { AccessRole } from '@app-types/models/account.types';
import { StockItemService } from '@modules/finance/stock-item.service';
import { StockTransactionService } from '@modules/finance/stock-transaction.service';
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
import { StockTransactionUsecase } from '@usecases/finance/stock-transaction.usecase';
import { currentSession } from '../decorators/current-user.decorator';
import { Roles } from '../decorators/roles.decorator';
import { mapPage, type ListResponse } from '../dto/detail.dto';
import { toSearchParams } from '../dto/list-query.dto';
import {
  CreateStockItemDto,
  CreateStockTransactionDto,
  StockItemQueryDto,
  StockTransactionQueryDto,
  UpdateStockItemDto,
} from './dto/stock.dto';
import {
  toStockItemView,
  toStockTransactionView,
  type StockItemView,
  type StockTransactionView,
} from './finance.presenter';

@ApiTags('finance')
@ApiBearerAuth()
@Controller('finance/stock-items')
export class StockItemsController {
  constructor(private readonly stockItemService: StockItemService) {}

  @Get()
  async list(@Query() query: StockItemQueryDto): Promise<ListResponse<StockItemView>> {
    const page = await this.stockItemService.search(
      toSearchParams(query, { needsReorder: query.needsReorder }),
    );
    return mapPage(page, toStockItemView);
  }

  @Get(':id')
  async get(@Param('id', ParseIntPipe) id: number): Promise<StockItemView> {
    return toStockItemView(await this.stockItemService.getOrThrow(id));
  }

  @Roles(AccessRole.STAFF)
  @Post()
  async create(@Body() body: CreateStockItemDto): Promise<StockItemView> {
    return toStockItemView(await this.stockItemService.create(body));
  }

  @Roles(AccessRole.STAFF)
  @Patch(':id')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() body: UpdateStockItemDto,
  ): Promise<StockItemView> {
    return toStockItemView(await this.stockItemService.update(id, body));
  }

  @Roles(AccessRole.STAFF)
  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseIntPipe) id: number): Promise<void> {
    await this.stockItemService.remove(id);
  }
}

/**
 * 库存流水只增删，不提供修改；增删同步调整物料现有量
 */
@ApiTags('finance')
@ApiBearerAuth()
@Controller('finance/stock-transactions')
export class StockTransactionsController {
  constructor(
    private readonly transactionService: StockTransactionService,
    private readonly transactionUsecase: StockTransactionUsecase,
  ) {}

  @Get()
  async list(@Query() query: StockTransactionQueryDto): Promise<ListResponse<StockTransactionView>> {
    const page = await this.transactionService.search(toSearchParams(query, { itemId: query.item }));
    return mapPage(page, toStockTransactionView);
  }

  @Get(':id')
  async get(@Param('id', ParseIntPipe) id: number): Promise<StockTransactionView> {
    return toStockTransactionView(await this.transactionService.getOrThrow(id));
  }

  @Roles(AccessRole.STAFF)
  @Post()
  async create(
    @currentSession() session: UsecaseSession,
    @Body() body: CreateStockTransactionDto,
  ): Promise<StockTransactionView> {
    return toStockTransactionView(await this.transactionUsecase.create(session, body));
  }

  @Roles(AccessRole.STAFF)
  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseIntPipe) id: number): Promise<void> {
    await this.transactionUsecase.remove(id);
  }
}
