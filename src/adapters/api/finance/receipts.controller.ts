// src/adapters/api/finance/receipts.controller.ts
import type { UsecaseSession } from '@app-types/auth/session.types';
import { AccessRole } from '@app-types/models/account.types';
import { FeesReceiptService } from '@modules/finance/fees-receipt.service';
import { StudentService } from '@modules/student/student.service';
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
  StreamableFile,
} from '@nestjs/common';
import { ApiBearerAuth, ApiProduces, ApiTags } from '@nestjs/swagger';
import { ReceiptPdfUsecase } from '@usecases/finance/receipt-pdf.usecase';
import { SaveReceiptUsecase } from '@usecases/finance/save-receipt.usecase';
import { currentSession } from '../decorators/current-user.decorator';
import { Roles } from '../decorators/roles.decorator';
import { mapPage, type DetailResponse, type ListResponse } from '../dto/detail.dto';
import { toSearchParams } from '../dto/list-query.dto';
import { CreateReceiptDto, ReceiptQueryDto, UpdateReceiptDto } from './dto/receipt.dto';
import { toReceiptView, type ReceiptView } from './finance.presenter';

/**
 * 收据：读需登录，写需员工；锁定后不可修改或删除
 */
@ApiTags('finance')
@ApiBearerAuth()
@Controller('finance/receipts')
export class ReceiptsController {
  constructor(
    private readonly receiptService: FeesReceiptService,
    private readonly saveReceiptUsecase: SaveReceiptUsecase,
    private readonly receiptPdfUsecase: ReceiptPdfUsecase,
  ) {}

  @Get()
  async list(@Query() query: ReceiptQueryDto): Promise<ListResponse<ReceiptView>> {
    const page = await this.receiptService.search(
      toSearchParams(query, {
        mode: query.mode,
        locked: query.locked,
        date: query.date,
        studentId: query.student,
        courseId: query.course,
        batchId: query.batch,
      }),
    );
    return mapPage(page, toReceiptView);
  }

  @Get(':id')
  async get(@Param('id', ParseIntPipe) id: number): Promise<ReceiptView> {
    return toReceiptView(await this.receiptService.getOrThrow(id));
  }

  /** 员工或收据所属学员可下载 */
  @Get(':id/pdf')
  @ApiProduces('application/pdf')
  async pdf(
    @currentSession() session: UsecaseSession,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<StreamableFile> {
    const { fileName, content } = await this.receiptPdfUsecase.execute(session, id);
    return new StreamableFile(content, {
      type: 'application/pdf',
      disposition: `attachment; filename="${fileName}"`,
    });
  }

  @Roles(AccessRole.STAFF)
  @Post()
  async create(
    @currentSession() session: UsecaseSession,
    @Body() body: CreateReceiptDto,
  ): Promise<ReceiptView> {
    return toReceiptView(await this.saveReceiptUsecase.create(session, body));
  }

  @Roles(AccessRole.STAFF)
  @Patch(':id')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() body: UpdateReceiptDto,
  ): Promise<ReceiptView> {
    return toReceiptView(await this.saveReceiptUsecase.update(id, body));
  }

  @Roles(AccessRole.STAFF)
  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseIntPipe) id: number): Promise<void> {
    await this.saveReceiptUsecase.remove(id);
  }

  @Roles(AccessRole.STAFF)
  @Post(':id/lock')
  @HttpCode(HttpStatus.OK)
  async lock(@Param('id', ParseIntPipe) id: number): Promise<DetailResponse> {
    return this.saveReceiptUsecase.lock(id);
  }

  @Roles(AccessRole.STAFF)
  @Post(':id/unlock')
  @HttpCode(HttpStatus.OK)
  async unlock(@Param('id', ParseIntPipe) id: number): Promise<DetailResponse> {
    return this.saveReceiptUsecase.unlock(id);
  }
}

/**
 * 学员查看本人收据
 */
@ApiTags('finance')
@ApiBearerAuth()
@Controller('finance/my-receipts')
export class MyReceiptsController {
  constructor(
    private readonly receiptService: FeesReceiptService,
    private readonly studentService: StudentService,
  ) {}

  @Roles(AccessRole.STUDENT)
  @Get()
  async list(@currentSession() session: UsecaseSession): Promise<ReceiptView[]> {
    const student = await this.studentService.getByUserIdOrThrow(session.accountId);
    const receipts = await this.receiptService.findByStudent(student.id);
    return receipts.map(toReceiptView);
  }
}
