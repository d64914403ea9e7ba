// src/adapters/api/course/batches.controller.ts
import { AccessRole } from '@app-types/models/account.types';
import { BatchService } from '@modules/course/batch.service';
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
import { SaveBatchUsecase } from '@usecases/course/save-batch.usecase';
import { Roles } from '../decorators/roles.decorator';
import { mapPage, type ListResponse } from '../dto/detail.dto';
import { toSearchParams } from '../dto/list-query.dto';
import { toBatchView, type BatchView } from './course.presenter';
import { BatchQueryDto, CreateBatchDto, UpdateBatchDto } from './dto/course.dto';

@ApiTags('batches')
@ApiBearerAuth()
@Controller('batches')
export class BatchesController {
  constructor(
    private readonly batchService: BatchService,
    private readonly saveBatchUsecase: SaveBatchUsecase,
  ) {}

  @Get()
  async list(@Query() query: BatchQueryDto): Promise<ListResponse<BatchView>> {
    const page = await this.batchService.search(
      toSearchParams(query, {
        courseId: query.course,
        trainerId: query.trainer,
        startDate: query.startDate,
      }),
    );
    return mapPage(page, toBatchView);
  }

  @Get(':id')
  async get(@Param('id', ParseIntPipe) id: number): Promise<BatchView> {
    return toBatchView(await this.batchService.getOrThrow(id));
  }

  @Roles(AccessRole.STAFF)
  @Post()
  async create(@Body() body: CreateBatchDto): Promise<BatchView> {
    return toBatchView(await this.saveBatchUsecase.create(body));
  }

  @Roles(AccessRole.STAFF)
  @Patch(':id')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() body: UpdateBatchDto,
  ): Promise<BatchView> {
    return toBatchView(await this.saveBatchUsecase.update(id, body));
  }

  @Roles(AccessRole.STAFF)
  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseIntPipe) id: number): Promise<void> {
    await this.batchService.remove(id);
  }
}
