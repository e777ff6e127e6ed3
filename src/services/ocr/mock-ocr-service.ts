// Mock OCR engine for development/testing without Google Cloud credentials
import sharp from 'sharp';
import type { OcrEngine, PageSegMode } from '@/types/ocr';

export interface MockOcrCall {
  pageSegMode: PageSegMode;
  charWhitelist?: string;
  language?: string;
  width: number;                  // pixel size of the image the engine received
  height: number;
}

export type MockOcrResponder = (call: MockOcrCall) => string | Promise<string>;

/**
 * Scripted engine: returns a fixed text, or whatever the responder decides
 * for the image it was handed. Every call is recorded.
 */
export class MockOcrEngine implements OcrEngine {
  readonly calls: MockOcrCall[] = [];

  constructor(
    private readonly responder: MockOcrResponder | string,
    private readonly delayMs = 0
  ) {}

  async recognize(
    image: Buffer,
    pageSegMode: PageSegMode,
    charWhitelist?: string,
    language?: string
  ): Promise<string> {
    const metadata = await sharp(image).metadata();
    const call: MockOcrCall = {
      pageSegMode,
      charWhitelist,
      language,
      width: metadata.width ?? 0,
      height: metadata.height ?? 0,
    };
    this.calls.push(call);

    if (this.delayMs > 0) {
      // Simulate processing time
      await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    }

    return typeof this.responder === 'string' ? this.responder : this.responder(call);
  }
}
