// src/adapters/api/finance/payroll.controller.ts
import { AccessRole } from '@app-types/models/account.types';
import { PayrollService } from '@modules/finance/payroll.service';
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
import { SavePayrollUsecase } from '@usecases/finance/save-payroll.usecase';
import { Roles } from '../decorators/roles.decorator';
import { mapPage, type ListResponse } from '../dto/detail.dto';
import { toSearchParams } from '../dto/list-query.dto';
import { CreatePayrollDto, PayrollQueryDto, UpdatePayrollDto } from './dto/ledger.dto';
import { toPayrollView, type PayrollView } from './finance.presenter';

@ApiTags('finance')
@ApiBearerAuth()
@Controller('finance/payroll')
export class PayrollController {
  constructor(
    private readonly payrollService: PayrollService,
    private readonly savePayrollUsecase: SavePayrollUsecase,
  ) {}

  @Get()
  async list(@Query() query: PayrollQueryDto): Promise<ListResponse<PayrollView>> {
    const page = await this.payrollService.search(
      toSearchParams(query, { month: query.month, status: query.status, trainerId: query.trainer }),
    );
    return mapPage(page, toPayrollView);
  }

  @Get(':id')
  async get(@Param('id', ParseIntPipe) id: number): Promise<PayrollView> {
    return toPayrollView(await this.payrollService.getOrThrow(id));
  }

  @Roles(AccessRole.STAFF)
  @Post()
  async create(@Body() body: CreatePayrollDto): Promise<PayrollView> {
    return toPayrollView(await this.savePayrollUsecase.create(body));
  }

  @Roles(AccessRole.STAFF)
  @Patch(':id')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() body: UpdatePayrollDto,
  ): Promise<PayrollView> {
    return toPayrollView(await this.savePayrollUsecase.update(id, body));
  }

  @Roles(AccessRole.STAFF)
  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseIntPipe) id: number): Promise<void> {
    await this.payrollService.remove(id);
  }
}
