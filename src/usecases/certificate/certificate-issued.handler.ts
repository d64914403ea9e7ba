// src/usecases/certificate/certificate-issued.handler.ts
import {
  type IntegrationEventEnvelope,
  readPayloadId,
} from '@core/common/integration-events/events.types';
import { buildVerifyUrl, durationText } from '@core/certificate/certificate.policy';
import { fullName } from '@modules/account/user.entity';
import { CertificateService } from '@modules/certificate/certificate.service';
import type { IntegrationEventHandler } from '@modules/common/integration-events/outbox.dispatcher';
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { certificateDocument } from '@src/infrastructure/pdf/certificate.document';
import { renderPdf } from '@src/infrastructure/pdf/pdf-renderer';
import { MediaStorageService } from '@src/infrastructure/storage/media-storage.service';
import { PinoLogger } from 'nestjs-pino';

/**
 * CertificateIssued 事件处理器：生成证书 PDF
 * 已有文件时跳过
 */
@Injectable()
export class CertificateIssuedHandler implements IntegrationEventHandler {
  readonly type = 'CertificateIssued' as const;

  constructor(
    private readonly certificateService: CertificateService,
    private readonly storage: MediaStorageService,
    private readonly config: ConfigService,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(CertificateIssuedHandler.name);
  }

  async handle({ envelope }: { readonly envelope: IntegrationEventEnvelope }): Promise<void> {
    const certificateId = readPayloadId(envelope.payload, 'certificateId');
    if (!certificateId) {
      this.logger.warn({ payload: envelope.payload }, '事件缺少 certificateId');
      return;
    }
    const certificate = await this.certificateService.findById(certificateId);
    if (!certificate) {
      this.logger.warn({ certificateId }, '证书不存在，跳过 PDF 生成');
      return;
    }
    if (certificate.pdfFile) {
      this.logger.info({ certificateNo: certificate.certificateNo }, '证书 PDF 已存在，跳过');
      return;
    }

    const frontendUrl = this.config.get<string>('server.frontendUrl', 'http://localhost:5173');
    const user = certificate.student?.user;
    const content = await renderPdf(
      certificateDocument({
        certificateNo: certificate.certificateNo,
        studentName: user ? fullName(user) || user.username : '',
        courseTitle: certificate.course?.title ?? '',
        durationText: durationText(certificate.course?.durationWeeks),
        issueDate: certificate.issueDate,
        verifyUrl: buildVerifyUrl(frontendUrl, certificate.qrHash),
        qrHash: certificate.qrHash,
      }),
      { size: 'A4', layout: 'landscape', margin: 50 },
    );
    const pdfFile = await this.storage.save(`certificates/pdfs/${certificate.certificateNo}.pdf`, content);
    await this.certificateService.update(certificate, { pdfFile });
    this.logger.info({ certificateNo: certificate.certificateNo, pdfFile }, '证书 PDF 已生成');
  }
}
