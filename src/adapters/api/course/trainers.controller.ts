// src/adapters/api/course/trainers.controller.ts
import { AccessRole } from '@app-types/models/account.types';
import { UserService } from '@modules/account/user.service';
import { TrainerService } from '@modules/course/trainer.service';
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
import { toSearchParams } from '../dto/list-query.dto';
import { toTrainerView, type TrainerView } from './course.presenter';
import { CreateTrainerDto, TrainerQueryDto, UpdateTrainerDto } from './dto/course.dto';

@ApiTags('trainers')
@ApiBearerAuth()
@Controller('trainers')
export class TrainersController {
  constructor(
    private readonly trainerService: TrainerService,
    private readonly userService: UserService,
  ) {}

  @Get()
  async list(@Query() query: TrainerQueryDto): Promise<ListResponse<TrainerView>> {
    const page = await this.trainerService.search(
      toSearchParams(query, { isActive: query.isActive, joinDate: query.joinDate }),
    );
    return mapPage(page, toTrainerView);
  }

  @Get(':id')
  async get(@Param('id', ParseIntPipe) id: number): Promise<TrainerView> {
    return toTrainerView(await this.trainerService.getOrThrow(id));
  }

  @Roles(AccessRole.STAFF)
  @Post()
  async create(@Body() body: CreateTrainerDto): Promise<TrainerView> {
    await this.userService.getOrThrow(body.userId);
    return toTrainerView(await this.trainerService.create(body));
  }

  @Roles(AccessRole.STAFF)
  @Patch(':id')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() body: UpdateTrainerDto,
  ): Promise<TrainerView> {
    return toTrainerView(await this.trainerService.update(id, body));
  }

  @Roles(AccessRole.STAFF)
  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseIntPipe) id: number): Promise<void> {
    await this.trainerService.remove(id);
  }
}
