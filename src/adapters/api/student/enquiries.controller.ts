// src/adapters/api/student/enquiries.controller.ts
import { AccessRole } from '@app-types/models/account.types';
import { EnquiryService } from '@modules/student/enquiry.service';
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
import { ApiTags } from '@nestjs/swagger';
import { Public } from '../decorators/public.decorator';
import { Roles } from '../decorators/roles.decorator';
import { mapPage, type ListResponse } from '../dto/detail.dto';
import { toSearchParams } from '../dto/list-query.dto';
import { CreateEnquiryDto, EnquiryQueryDto, UpdateEnquiryDto } from './dto/enquiry.dto';
import { toEnquiryView, type EnquiryView } from './student.presenter';

/**
 * 咨询登记：公开提交，其余操作限员工
 */
@ApiTags('enquiries')
@Roles(AccessRole.STAFF)
@Controller('enquiries')
export class EnquiriesController {
  constructor(private readonly enquiryService: EnquiryService) {}

  @Public()
  @Roles()
  @Post()
  async create(@Body() body: CreateEnquiryDto): Promise<EnquiryView> {
    return toEnquiryView(await this.enquiryService.create(body));
  }

  @Get()
  async list(@Query() query: EnquiryQueryDto): Promise<ListResponse<EnquiryView>> {
    const page = await this.enquiryService.search(
      toSearchParams(query, { status: query.status, courseInterest: query.courseInterest }),
    );
    return mapPage(page, toEnquiryView);
  }

  @Get(':id')
  async get(@Param('id', ParseIntPipe) id: number): Promise<EnquiryView> {
    return toEnquiryView(await this.enquiryService.getOrThrow(id));
  }

  @Patch(':id')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() body: UpdateEnquiryDto,
  ): Promise<EnquiryView> {
    return toEnquiryView(await this.enquiryService.update(id, body));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseIntPipe) id: number): Promise<void> {
    await this.enquiryService.remove(id);
  }
}
