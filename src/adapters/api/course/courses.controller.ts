// src/adapters/api/course/courses.controller.ts
import { AccessRole } from '@app-types/models/account.types';
import { CourseService } from '@modules/course/course.service';
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
import { toCourseView, type CourseView } from './course.presenter';
import { CourseQueryDto, CreateCourseDto, UpdateCourseDto } from './dto/course.dto';

/**
 * 课程目录：列表与详情公开，写操作限管理员
 */
@ApiTags('courses')
@Controller('courses')
export class CoursesController {
  constructor(private readonly courseService: CourseService) {}

  @Public()
  @Get()
  async list(@Query() query: CourseQueryDto): Promise<ListResponse<CourseView>> {
    const page = await this.courseService.search(
      toSearchParams(query, { active: query.active, durationWeeks: query.durationWeeks }),
    );
    return mapPage(page, toCourseView);
  }

  @Public()
  @Get(':id')
  async get(@Param('id', ParseIntPipe) id: number): Promise<CourseView> {
    return toCourseView(await this.courseService.getOrThrow(id));
  }

  @Roles(AccessRole.ADMIN)
  @Post()
  async create(@Body() body: CreateCourseDto): Promise<CourseView> {
    return toCourseView(await this.courseService.create(body));
  }

  @Roles(AccessRole.ADMIN)
  @Patch(':id')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() body: UpdateCourseDto,
  ): Promise<CourseView> {
    return toCourseView(await this.courseService.update(id, body));
  }

  @Roles(AccessRole.ADMIN)
  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseIntPipe) id: number): Promise<void> {
    await this.courseService.remove(id);
  }
}
