// src/infrastructure/pdf/receipt.document.ts
import type { PdfDrawer } from './pdf-renderer';

export interface ReceiptDocumentView {
  readonly receiptNo: string;
  readonly date: string;
  readonly studentName: string;
  readonly regNo: string;
  readonly courseTitle: string | null;
  readonly batchCode: string | null;
  readonly amount: string;
  readonly mode: string;
  readonly txnId: string;
}

/** 收据版式：标题、明细表、金额 */
export function receiptDocument(view: ReceiptDocumentView): PdfDrawer {
  return (doc) => {
    doc.fontSize(20).text('Fee Receipt', { align: 'center' });
    doc.moveDown();
    doc.fontSize(11);

    const rows: Array<[string, string]> = [
      ['Receipt No', view.receiptNo],
      ['Date', view.date],
      ['Student', view.studentName],
      ['Reg No', view.regNo],
      ['Course', view.courseTitle ?? '-'],
      ['Batch', view.batchCode ?? '-'],
      ['Payment Mode', view.mode],
      ['Transaction ID', view.txnId || '-'],
    ];
    for (const [label, value] of rows) {
      doc.text(`${label}: ${value}`);
    }

    doc.moveDown();
    doc.fontSize(14).text(`Amount Paid: INR ${view.amount}`);
  };
}
