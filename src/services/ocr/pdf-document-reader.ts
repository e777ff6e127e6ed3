/**
 * PDF Document Reader
 *
 * pdf-parse backed implementation of both PDF collaborators: the embedded
 * text layer and page rasterization for the OCR fallback.
 */

import type { PdfRasterizer, PdfTextLayerExtractor } from '@/types/ocr';

const PDF_SIGNATURE = '%PDF-';

export function isPdf(bytes: Buffer): boolean {
  return bytes.length >= PDF_SIGNATURE.length && bytes.subarray(0, PDF_SIGNATURE.length).toString('latin1') === PDF_SIGNATURE;
}

export class PdfDocumentReader implements PdfTextLayerExtractor, PdfRasterizer {
  constructor(private readonly renderScale = 2) {}

  private async open(pdf: Buffer) {
    // pdf-parse pulls in pdf.js; load it only when a PDF actually arrives
    const { PDFParse } = await import('pdf-parse');
    return new PDFParse({ data: new Uint8Array(pdf) });
  }

  async extractEmbeddedText(pdf: Buffer): Promise<string> {
    const parser = await this.open(pdf);
    try {
      const result = await parser.getText();
      return result.text ?? '';
    } finally {
      await parser.destroy();
    }
  }

  async rasterize(pdf: Buffer, maxPages: number): Promise<Buffer[]> {
    const parser = await this.open(pdf);
    try {
      const screenshots = await parser.getScreenshot({ scale: this.renderScale });
      return screenshots.pages
        .slice(0, Math.max(0, maxPages))
        .map((page) => Buffer.from(page.data));
    } finally {
      await parser.destroy();
    }
  }
}
