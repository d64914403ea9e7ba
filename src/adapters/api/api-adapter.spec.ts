// src/adapters/api/api-adapter.spec.ts
import { HttpExceptionsFilter } from '@core/common/filters/http-exception.filter';
import { MiddlewareModule } from '@core/middleware/middleware.module';
import { UserService } from '@modules/account/user.service';
import { JwtStrategy } from '@modules/auth/strategies/jwt.strategy';
import { CertificateService } from '@modules/certificate/certificate.service';
import { INestApplication } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER, APP_GUARD } from '@nestjs/core';
import { JwtModule, JwtService } from '@nestjs/jwt';
import { PassportModule } from '@nestjs/passport';
import { Test } from '@nestjs/testing';
import { MediaStorageService } from '@src/infrastructure/storage/media-storage.service';
import { CertificateAccessUsecase } from '@usecases/certificate/certificate-access.usecase';
import { IssueCertificateUsecase } from '@usecases/certificate/issue-certificate.usecase';
import { CheckOverdueFeesJob } from '@usecases/finance/check-overdue-fees.job';
import { LoggerModule } from 'nestjs-pino';
import request from 'supertest';
import { CertificatesController } from './certificate/certificates.controller';
import { FinanceJobsController } from './finance/finance-reports.controller';
import { JwtAuthGuard } from './guards/jwt-auth.guard';
import { RolesGuard } from './guards/roles.guard';
import { HEALTH_MESSAGE, HealthController } from './health/health.controller';

const JWT = { secret: 'test-secret', issuer: 'institute-api', audience: 'institute-web' };

describe('REST 适配层（守卫、响应格式）', () => {
  let app: INestApplication;
  let jwt: JwtService;

  const userService = { findById: jest.fn() };
  const staffUser = { id: 7, username: 'tester', isActive: true, isStaff: true, isSuperuser: false, role: null };
  const accessUsecase = { verify: jest.fn(), toggleRevoke: jest.fn(), download: jest.fn(), mine: jest.fn() };
  const certificateService = { search: jest.fn(), getOrThrow: jest.fn(), update: jest.fn(), remove: jest.fn() };
  const overdueJob = { run: jest.fn() };

  const tokenFor = (accessGroup: string[]): string =>
    jwt.sign({ sub: 7, username: 'tester', email: null, accessGroup, type: 'access' });

  beforeAll(async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true, load: [() => ({ jwt: JWT })] }),
        LoggerModule.forRoot({ pinoHttp: { level: 'silent' } }),
        PassportModule,
        JwtModule.register({
          secret: JWT.secret,
          signOptions: { issuer: JWT.issuer, audience: JWT.audience, expiresIn: '5m' },
        }),
        MiddlewareModule,
      ],
      controllers: [HealthController, CertificatesController, FinanceJobsController],
      providers: [
        JwtStrategy,
        { provide: UserService, useValue: userService },
        { provide: CertificateService, useValue: certificateService },
        { provide: CertificateAccessUsecase, useValue: accessUsecase },
        { provide: IssueCertificateUsecase, useValue: { execute: jest.fn() } },
        { provide: MediaStorageService, useValue: { urlFor: jest.fn() } },
        { provide: CheckOverdueFeesJob, useValue: overdueJob },
        { provide: APP_GUARD, useClass: JwtAuthGuard },
        { provide: APP_GUARD, useClass: RolesGuard },
        { provide: APP_FILTER, useClass: HttpExceptionsFilter },
      ],
    }).compile();

    app = moduleRef.createNestApplication();
    await app.init();
    jwt = moduleRef.get(JwtService);
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => {
    userService.findById.mockResolvedValue(staffUser);
  });

  it('健康检查无需登录，响应包裹为 envelope', async () => {
    const res = await request(app.getHttpServer()).get('/health').expect(200);

    expect(res.body.success).toBe(true);
    expect(res.body.data.status).toBe('ok');
    expect(res.body.data.message).toBe(HEALTH_MESSAGE);
  });

  it('未携带令牌访问受保护路由返回 401', async () => {
    const res = await request(app.getHttpServer()).get('/certificates').expect(401);

    expect(res.body.success).toBe(false);
    expect(res.body.errorCode).toBe('JWT_AUTHENTICATION_FAILED');
    expect(res.body.errorMessage).toBe('Authentication credentials were not provided or are invalid.');
    expect(certificateService.search).not.toHaveBeenCalled();
  });

  it('用户已停用时令牌无效', async () => {
    userService.findById.mockResolvedValue({ ...staffUser, isActive: false });

    const res = await request(app.getHttpServer())
      .get('/certificates')
      .set('Authorization', `Bearer ${tokenFor(['STAFF'])}`)
      .expect(401);

    expect(res.body.errorCode).toBe('JWT_AUTHENTICATION_FAILED');
  });

  it('角色不足返回 403', async () => {
    const res = await request(app.getHttpServer())
      .post('/finance/jobs/check-overdue')
      .set('Authorization', `Bearer ${tokenFor(['STAFF'])}`)
      .expect(403);

    expect(res.body.errorCode).toBe('PERMISSION_INSUFFICIENT_PERMISSIONS');
    expect(res.body.errorMessage).toBe('You do not have permission to perform this action.');
    expect(overdueJob.run).not.toHaveBeenCalled();
  });

  it('角色以数据库为准，令牌中残留的 ADMIN 不生效', async () => {
    const res = await request(app.getHttpServer())
      .post('/finance/jobs/check-overdue')
      .set('Authorization', `Bearer ${tokenFor(['ADMIN', 'STAFF'])}`)
      .expect(403);

    expect(res.body.errorCode).toBe('PERMISSION_INSUFFICIENT_PERMISSIONS');
    expect(overdueJob.run).not.toHaveBeenCalled();
  });

  it('名为 Admin 的 Role 记录不授予管理员权限', async () => {
    userService.findById.mockResolvedValue({ ...staffUser, role: { id: 3, name: 'Admin' } });

    const res = await request(app.getHttpServer())
      .post('/finance/jobs/check-overdue')
      .set('Authorization', `Bearer ${tokenFor(['STAFF'])}`)
      .expect(403);

    expect(res.body.errorCode).toBe('PERMISSION_INSUFFICIENT_PERMISSIONS');
    expect(overdueJob.run).not.toHaveBeenCalled();
  });

  it('管理员可手动触发逾期检查', async () => {
    userService.findById.mockResolvedValue({ ...staffUser, isSuperuser: true });
    overdueJob.run.mockResolvedValue({ detail: '2 overdue reminders queued.' });

    const res = await request(app.getHttpServer())
      .post('/finance/jobs/check-overdue')
      .set('Authorization', `Bearer ${tokenFor(['ADMIN', 'STAFF'])}`)
      .expect(200);

    expect(res.body.data).toEqual({ detail: '2 overdue reminders queued.' });
  });

  it('证书校验公开，找不到时返回 404 与 valid=false', async () => {
    accessUsecase.verify.mockResolvedValue(null);

    const res = await request(app.getHttpServer()).get('/certificates/verify/unknown-hash').expect(404);

    expect(accessUsecase.verify).toHaveBeenCalledWith('unknown-hash');
    expect(res.body.success).toBe(false);
    expect(res.body.data).toEqual({ valid: false, message: 'Certificate not found or revoked.' });
    expect(res.body.errorMessage).toBe('Certificate not found or revoked.');
  });

  it('证书校验成功时返回证书摘要', async () => {
    const verification = {
      valid: true,
      certificateNo: 'CERT-20240105-0001',
      studentName: 'Asha Rao',
      courseTitle: 'Tailoring Basics',
      issueDate: '2024-01-05',
      remarks: '',
    };
    accessUsecase.verify.mockResolvedValue(verification);

    const res = await request(app.getHttpServer()).get('/certificates/verify/hash-1').expect(200);

    expect(res.body.success).toBe(true);
    expect(res.body.data).toEqual(verification);
  });
});
