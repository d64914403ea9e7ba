// src/infrastructure/pdf/certificate.document.ts
import type { PdfDrawer } from './pdf-renderer';

export interface CertificateDocumentView {
  readonly certificateNo: string;
  readonly studentName: string;
  readonly courseTitle: string;
  readonly durationText: string;
  readonly issueDate: string;
  readonly verifyUrl: string;
  readonly qrHash: string;
}

/** 证书版式，横向 A4；校验链接与哈希以文本打印 */
export function certificateDocument(view: CertificateDocumentView): PdfDrawer {
  return (doc) => {
    doc.fontSize(28).text('Certificate of Completion', { align: 'center' });
    doc.moveDown(1.5);
    doc.fontSize(14).text('This is to certify that', { align: 'center' });
    doc.moveDown(0.5);
    doc.fontSize(22).text(view.studentName, { align: 'center' });
    doc.moveDown(0.5);
    doc.fontSize(14).text('has successfully completed the course', { align: 'center' });
    doc.moveDown(0.5);
    doc.fontSize(18).text(view.courseTitle, { align: 'center' });
    if (view.durationText) {
      doc.fontSize(12).text(`Duration: ${view.durationText}`, { align: 'center' });
    }

    doc.moveDown(2);
    doc.fontSize(11);
    doc.text(`Issue Date: ${view.issueDate}`);
    doc.text(`Certificate No: ${view.certificateNo}`);
    doc.text(`Verify: ${view.verifyUrl}`);
    doc.fontSize(8).text(`Hash: ${view.qrHash}`);
  };
}
