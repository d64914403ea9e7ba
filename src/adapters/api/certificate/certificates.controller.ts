// src/adapters/api/certificate/certificates.controller.ts
import type { UsecaseSession } from '@app-types/auth/session.types';
import { AccessRole } from '@app-types/models/account.types';
import type { CertificateEntity } from '@modules/certificate/certificate.entity';
import { CertificateService } from '@modules/certificate/certificate.service';
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
  Res,
  StreamableFile,
} from '@nestjs/common';
import { ApiBearerAuth, ApiProduces, ApiTags } from '@nestjs/swagger';
import {
  CertificateAccessUsecase,
  NOT_FOUND_OR_REVOKED_MESSAGE,
} from '@usecases/certificate/certificate-access.usecase';
import { IssueCertificateUsecase } from '@usecases/certificate/issue-certificate.usecase';
import { MediaStorageService } from '@src/infrastructure/storage/media-storage.service';
import type { Response } from 'express';
import { currentSession } from '../decorators/current-user.decorator';
import { Public } from '../decorators/public.decorator';
import { Roles } from '../decorators/roles.decorator';
import { mapPage, type ListResponse } from '../dto/detail.dto';
import { toSearchParams } from '../dto/list-query.dto';
import { toCertificateView, type CertificateView } from './certificate.presenter';
import { CertificateQueryDto, IssueCertificateDto, UpdateCertificateDto } from './dto/certificate.dto';

export interface InvalidCertificate {
  readonly valid: false;
  readonly message: string;
}

/**
 * 证书：读需员工，写需管理员；校验接口公开
 */
@ApiTags('certificates')
@ApiBearerAuth()
@Controller('certificates')
export class CertificatesController {
  constructor(
    private readonly certificateService: CertificateService,
    private readonly issueCertificateUsecase: IssueCertificateUsecase,
    private readonly accessUsecase: CertificateAccessUsecase,
    private readonly storage: MediaStorageService,
  ) {}

  private readonly view = (certificate: CertificateEntity): CertificateView =>
    toCertificateView(certificate, (path) => this.storage.urlFor(path));

  /** 不存在或已吊销时返回 404 与 valid=false */
  @Public()
  @Get('verify/:qrHash')
  async verify(@Param('qrHash') qrHash: string, @Res() res: Response): Promise<void> {
    const result = await this.accessUsecase.verify(qrHash);
    if (result) {
      res.status(HttpStatus.OK).json(result);
      return;
    }
    const invalid: InvalidCertificate = { valid: false, message: NOT_FOUND_OR_REVOKED_MESSAGE };
    res.status(HttpStatus.NOT_FOUND).json(invalid);
  }

  @Roles(AccessRole.STAFF)
  @Get()
  async list(@Query() query: CertificateQueryDto): Promise<ListResponse<CertificateView>> {
    const page = await this.certificateService.search(
      toSearchParams(query, {
        revoked: query.revoked,
        courseId: query.course,
        studentId: query.student,
      }),
    );
    return mapPage(page, this.view);
  }

  @Roles(AccessRole.STAFF)
  @Get(':id')
  async get(@Param('id', ParseIntPipe) id: number): Promise<CertificateView> {
    return this.view(await this.certificateService.getOrThrow(id));
  }

  /** 学员本人或员工下载 */
  @Get(':id/download')
  @ApiProduces('application/pdf')
  async download(
    @currentSession() session: UsecaseSession,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<StreamableFile> {
    const { fileName, content } = await this.accessUsecase.download(session, id);
    return new StreamableFile(content, {
      type: 'application/pdf',
      disposition: `attachment; filename="${fileName}"`,
    });
  }

  @Roles(AccessRole.ADMIN)
  @Post()
  async create(@Body() body: IssueCertificateDto): Promise<CertificateView> {
    return this.view(await this.issueCertificateUsecase.execute(body));
  }

  @Roles(AccessRole.ADMIN)
  @Patch(':id')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() body: UpdateCertificateDto,
  ): Promise<CertificateView> {
    const certificate = await this.certificateService.getOrThrow(id);
    return this.view(await this.certificateService.update(certificate, { remarks: body.remarks }));
  }

  @Roles(AccessRole.ADMIN)
  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseIntPipe) id: number): Promise<void> {
    await this.certificateService.remove(id);
  }

  @Roles(AccessRole.ADMIN)
  @Post(':id/revoke')
  @HttpCode(HttpStatus.OK)
  async revoke(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<{ detail: string; revoked: boolean }> {
    return this.accessUsecase.toggleRevoke(id);
  }
}

@ApiTags('certificates')
@ApiBearerAuth()
@Controller('my-certificates')
export class MyCertificatesController {
  constructor(
    private readonly accessUsecase: CertificateAccessUsecase,
    private readonly storage: MediaStorageService,
  ) {}

  @Roles(AccessRole.STUDENT)
  @Get()
  async list(@currentSession() session: UsecaseSession): Promise<CertificateView[]> {
    const certificates = await this.accessUsecase.mine(session);
    return certificates.map((certificate) =>
      toCertificateView(certificate, (path) => this.storage.urlFor(path)),
    );
  }
}
