// src/adapters/api/student/measurements.controller.ts
import { AccessRole } from '@app-types/models/account.types';
import { todayString } from '@core/common/date/date.helper';
import { MeasurementService } from '@modules/student/measurement.service';
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
} from '@nestjs/common';
import { ApiBearerAuth, ApiTags } from '@nestjs/swagger';
import { Roles } from '../decorators/roles.decorator';
import { mapPage, type ListResponse } from '../dto/detail.dto';
import { ListQueryDto, toPagination } from '../dto/list-query.dto';
import { MeasurementDto } from './dto/measurement.dto';
import { toMeasurementView, type MeasurementView } from './student.presenter';

/**
 * 量体记录，始终限定在路径中的学员下
 */
@ApiTags('measurements')
@ApiBearerAuth()
@Controller('students/:studentId/measurements')
export class MeasurementsController {
  constructor(
    private readonly measurementService: MeasurementService,
    private readonly studentService: StudentService,
  ) {}

  @Get()
  async list(
    @Param('studentId', ParseIntPipe) studentId: number,
    @Query() query: ListQueryDto,
  ): Promise<ListResponse<MeasurementView>> {
    await this.studentService.getOrThrow(studentId);
    const page = await this.measurementService.listByStudent(studentId, toPagination(query));
    return mapPage(page, toMeasurementView);
  }

  @Roles(AccessRole.STAFF)
  @Post()
  async create(
    @Param('studentId', ParseIntPipe) studentId: number,
    @Body() body: MeasurementDto,
  ): Promise<MeasurementView> {
    await this.studentService.getOrThrow(studentId);
    return toMeasurementView(
      await this.measurementService.create(studentId, body, todayString()),
    );
  }

  @Get(':id')
  async get(
    @Param('studentId', ParseIntPipe) studentId: number,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<MeasurementView> {
    return toMeasurementView(await this.measurementService.getOrThrow(studentId, id));
  }

  @Roles(AccessRole.STAFF)
  @Patch(':id')
  async update(
    @Param('studentId', ParseIntPipe) studentId: number,
    @Param('id', ParseIntPipe) id: number,
    @Body() body: MeasurementDto,
  ): Promise<MeasurementView> {
    return toMeasurementView(await this.measurementService.update(studentId, id, body));
  }

  @Roles(AccessRole.STAFF)
  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(
    @Param('studentId', ParseIntPipe) studentId: number,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<void> {
    await this.measurementService.remove(studentId, id);
  }
}
