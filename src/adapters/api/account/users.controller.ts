// src/adapters/api/account/users.controller.ts
import type { UsecaseSession } from '@app-types/auth/session.types';
import { AccessRole } from '@app-types/models/account.types';
import { UserService } from '@modules/account/user.service';
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
import { CreateUserUsecase } from '@usecases/account/create-user.usecase';
import { UpdateUserUsecase } from '@usecases/account/update-user.usecase';
import { currentSession } from '../decorators/current-user.decorator';
import { Roles } from '../decorators/roles.decorator';
import { mapPage, type ListResponse } from '../dto/detail.dto';
import { toSearchParams } from '../dto/list-query.dto';
import { toUserView, type UserView } from './account.presenter';
import { CreateUserDto, UpdateProfileDto, UpdateUserDto, UserQueryDto } from './dto/user.dto';

@ApiTags('users')
@ApiBearerAuth()
@Controller('users')
export class UsersController {
  constructor(
    private readonly userService: UserService,
    private readonly createUserUsecase: CreateUserUsecase,
    private readonly updateUserUsecase: UpdateUserUsecase,
  ) {}

  @Get('me')
  async me(@currentSession() session: UsecaseSession): Promise<UserView> {
    return toUserView(await this.userService.getOrThrow(session.accountId));
  }

  @Patch('me')
  async updateMe(
    @currentSession() session: UsecaseSession,
    @Body() body: UpdateProfileDto,
  ): Promise<UserView> {
    const user = await this.updateUserUsecase.execute(session, session.accountId, {
      email: body.email,
      firstName: body.firstName,
      lastName: body.lastName,
      phone: body.phone,
      address: body.address,
    });
    return toUserView(user);
  }

  @Roles(AccessRole.ADMIN)
  @Get()
  async list(@Query() query: UserQueryDto): Promise<ListResponse<UserView>> {
    const page = await this.userService.search(
      toSearchParams(query, { isActive: query.isActive, roleId: query.roleId }),
    );
    return mapPage(page, toUserView);
  }

  @Roles(AccessRole.ADMIN)
  @Post()
  async create(
    @currentSession() session: UsecaseSession,
    @Body() body: CreateUserDto,
  ): Promise<UserView> {
    return toUserView(await this.createUserUsecase.execute(session, body));
  }

  @Roles(AccessRole.ADMIN)
  @Get(':id')
  async get(@Param('id', ParseIntPipe) id: number): Promise<UserView> {
    return toUserView(await this.userService.getOrThrow(id));
  }

  /** 本人或管理员 */
  @Patch(':id')
  async update(
    @currentSession() session: UsecaseSession,
    @Param('id', ParseIntPipe) id: number,
    @Body() body: UpdateUserDto,
  ): Promise<UserView> {
    return toUserView(await this.updateUserUsecase.execute(session, id, body));
  }

  @Roles(AccessRole.ADMIN)
  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(
    @currentSession() session: UsecaseSession,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<void> {
    await this.userService.remove(id, session.username);
  }
}
