// src/usecases/finance/receipt-pdf.usecase.ts
import { type UsecaseSession, isStaffSession } from '@app-types/auth/session.types';
import { DomainError, FINANCE_ERROR } from '@core/common/errors/domain-error';
import { renderPdf } from '@src/infrastructure/pdf/pdf-renderer';
import { receiptDocument } from '@src/infrastructure/pdf/receipt.document';
import { MediaStorageService } from '@src/infrastructure/storage/media-storage.service';
import { fullName } from '@modules/account/user.entity';
import { FeesReceiptService } from '@modules/finance/fees-receipt.service';
import { Injectable } from '@nestjs/common';
import { PinoLogger } from 'nestjs-pino';

export const RECEIPT_FORBIDDEN_MESSAGE = 'You do not have permission to view this receipt.';

export interface ReceiptPdf {
  readonly fileName: string;
  readonly content: Buffer;
}

/**
 * 收据 PDF：每次请求重新生成并落盘
 */
@Injectable()
export class ReceiptPdfUsecase {
  constructor(
    private readonly receiptService: FeesReceiptService,
    private readonly storage: MediaStorageService,
    private readonly logger: PinoLogger,
  ) {
    this.logger.setContext(ReceiptPdfUsecase.name);
  }

  async execute(session: UsecaseSession, receiptId: number): Promise<ReceiptPdf> {
    const receipt = await this.receiptService.getOrThrow(receiptId);
    const ownerUserId = receipt.student?.userId;
    if (!isStaffSession(session) && ownerUserId !== session.accountId) {
      throw new DomainError(FINANCE_ERROR.RECEIPT_FORBIDDEN, RECEIPT_FORBIDDEN_MESSAGE, {
        receiptId,
      });
    }

    const user = receipt.student?.user;
    const content = await renderPdf(
      receiptDocument({
        receiptNo: receipt.receiptNo,
        date: receipt.date,
        studentName: user ? fullName(user) || user.username : '',
        regNo: receipt.student?.regNo ?? '',
        courseTitle: receipt.course?.title ?? null,
        batchCode: receipt.batch?.code ?? null,
        amount: receipt.amount,
        mode: receipt.mode,
        txnId: receipt.txnId,
      }),
    );

    const fileName = `${receipt.receiptNo}.pdf`;
    const pdfFile = await this.storage.save(`finance/receipts/${fileName}`, content);
    if (receipt.pdfFile !== pdfFile) {
      await this.receiptService.update(receipt, { pdfFile });
    }
    this.logger.info({ receiptId, pdfFile }, '收据 PDF 已生成');
    return { fileName, content };
  }
}
