// src/infrastructure/pdf/pdf-renderer.ts
import PDFDocument from 'pdfkit';

export type PdfDrawer = (doc: PDFKit.PDFDocument) => void;

/**
 * 将绘制函数渲染为 PDF Buffer
 */
export function renderPdf(
  draw: PdfDrawer,
  options: PDFKit.PDFDocumentOptions = { size: 'A4', margin: 50 },
): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    const doc = new PDFDocument(options);
    const chunks: Buffer[] = [];

    doc.on('data', (chunk: Buffer) => chunks.push(chunk));
    doc.on('end', () => resolve(Buffer.concat(chunks)));
    doc.on('error', reject);

    try {
      draw(doc);
    } catch (error) {
      reject(error);
      return;
    }
    doc.end();
  });
}
