// OCR Types
export type OcrStatus = 'success' | 'low_confidence' | 'failed';

// Page segmentation modes understood by the engines (tesseract numbering)
export type PageSegMode = 6 | 7 | 11;

export interface OcrResult {
  text: string;                   // merged, cleaned text incl. section markers
  status: OcrStatus;
  sourceTag: string;              // which passes ran, joined with '+'
  confidence: number;             // 0..100
}

/**
 * External OCR engine. Implementations may be slow; the orchestrator bounds
 * how many times it is called per document.
 */
export interface OcrEngine {
  recognize(
    image: Buffer,
    pageSegMode: PageSegMode,
    charWhitelist?: string,
    language?: string
  ): Promise<string>;
}

export interface PdfTextLayerExtractor {
  extractEmbeddedText(pdf: Buffer): Promise<string>;
}

export interface PdfRasterizer {
  rasterize(pdf: Buffer, maxPages: number): Promise<Buffer[]>;
}

// One image variant fed to the engine
export interface ImageVariant {
  name: string;
  image: Buffer;
}

// Best attempt of a single pass
export interface PassAttempt {
  text: string;
  score: number;                  // 0..1 text quality
  source: string;                 // e.g. img_base_denoise_psm6
}

// Outcome of the whole image pipeline for one page
export interface ImagePipelineResult {
  text: string;
  confidence: number;
  source: string;
}
