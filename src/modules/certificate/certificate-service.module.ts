// src/modules/certificate/certificate-service.module.ts
import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CertificateEntity } from './certificate.entity';
import { CertificateService } from './certificate.service';

@Module({
  imports: [TypeOrmModule.forFeature([CertificateEntity])],
  providers: [CertificateService],
  exports: [TypeOrmModule, CertificateService],
})
export class CertificateServiceModule {}
