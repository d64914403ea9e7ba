// src/adapters/api/student/students.controller.ts
import type { UsecaseSession } from '@app-types/auth/session.types';
import { AccessRole } from '@app-types/models/account.types';
import { MediaStorageService } from '@src/infrastructure/storage/media-storage.service';
import type { StudentEntity } from '@modules/student/student.entity';
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
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { ApiBearerAuth, ApiConsumes, ApiTags } from '@nestjs/swagger';
import { CreateStudentUsecase } from '@usecases/student/create-student.usecase';
import { UpdateStudentPhotoUsecase } from '@usecases/student/update-student-photo.usecase';
import { UpdateStudentUsecase } from '@usecases/student/update-student.usecase';
import { currentSession } from '../decorators/current-user.decorator';
import { Roles } from '../decorators/roles.decorator';
import { mapPage, type ListResponse } from '../dto/detail.dto';
import { toSearchParams } from '../dto/list-query.dto';
import { CreateStudentDto, StudentQueryDto, UpdateStudentDto } from './dto/student.dto';
import { toStudentView, type StudentView } from './student.presenter';

/**
 * 学员档案：读需登录，写需员工
 */
@ApiTags('students')
@ApiBearerAuth()
@Controller('students')
export class StudentsController {
  constructor(
    private readonly studentService: StudentService,
    private readonly storage: MediaStorageService,
    private readonly createStudentUsecase: CreateStudentUsecase,
    private readonly updateStudentUsecase: UpdateStudentUsecase,
    private readonly updateStudentPhotoUsecase: UpdateStudentPhotoUsecase,
  ) {}

  private readonly view = (student: StudentEntity): StudentView =>
    toStudentView(student, (path) => this.storage.urlFor(path));

  @Roles(AccessRole.STUDENT)
  @Get('me')
  async me(@currentSession() session: UsecaseSession): Promise<StudentView> {
    return this.view(await this.studentService.getByUserIdOrThrow(session.accountId));
  }

  /** 学员仅可上传本人照片（multipart 字段 photo） */
  @Roles(AccessRole.STUDENT)
  @Patch('me')
  @ApiConsumes('multipart/form-data')
  @UseInterceptors(FileInterceptor('photo'))
  async updateMyPhoto(
    @currentSession() session: UsecaseSession,
    @UploadedFile() photo: Express.Multer.File | undefined,
  ): Promise<StudentView> {
    return this.view(await this.updateStudentPhotoUsecase.execute(session, photo));
  }

  @Get()
  async list(@Query() query: StudentQueryDto): Promise<ListResponse<StudentView>> {
    const page = await this.studentService.search(
      toSearchParams(query, { active: query.active, admissionDate: query.admissionDate }),
    );
    return mapPage(page, this.view);
  }

  @Roles(AccessRole.STAFF)
  @Post()
  async create(
    @currentSession() session: UsecaseSession,
    @Body() body: CreateStudentDto,
  ): Promise<StudentView> {
    return this.view(await this.createStudentUsecase.execute(session, body));
  }

  @Get(':id')
  async get(@Param('id', ParseIntPipe) id: number): Promise<StudentView> {
    return this.view(await this.studentService.getOrThrow(id));
  }

  /** userPayload 不在白名单内，更新时被丢弃 */
  @Roles(AccessRole.STAFF)
  @Patch(':id')
  async update(
    @currentSession() session: UsecaseSession,
    @Param('id', ParseIntPipe) id: number,
    @Body() body: UpdateStudentDto,
  ): Promise<StudentView> {
    return this.view(await this.updateStudentUsecase.execute(session, id, body));
  }

  @Roles(AccessRole.STAFF)
  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(
    @currentSession() session: UsecaseSession,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<void> {
    await this.studentService.remove(id, session.username);
  }
}
