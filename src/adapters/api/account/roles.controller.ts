// src/adapters/api/account/roles.controller.ts
import { AccessRole } from '@app-types/models/account.types';
import { RoleService } from '@modules/account/role.service';
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
import { ListQueryDto, toSearchParams } from '../dto/list-query.dto';
import { toRoleView, type RoleView } from './account.presenter';
import { CreateRoleDto, UpdateRoleDto } from './dto/role.dto';

@ApiTags('roles')
@ApiBearerAuth()
@Roles(AccessRole.ADMIN)
@Controller('roles')
export class RolesController {
  constructor(private readonly roleService: RoleService) {}

  @Get()
  async list(@Query() query: ListQueryDto): Promise<ListResponse<RoleView>> {
    return mapPage(await this.roleService.search(toSearchParams(query)), toRoleView);
  }

  @Post()
  async create(@Body() body: CreateRoleDto): Promise<RoleView> {
    return toRoleView(await this.roleService.create(body));
  }

  @Get(':id')
  async get(@Param('id', ParseIntPipe) id: number): Promise<RoleView> {
    return toRoleView(await this.roleService.getOrThrow(id));
  }

  @Patch(':id')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() body: UpdateRoleDto,
  ): Promise<RoleView> {
    return toRoleView(await this.roleService.update(id, body));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseIntPipe) id: number): Promise<void> {
    await this.roleService.remove(id);
  }
}
