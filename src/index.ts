/**
 * Receipt field extraction: public API
 */

export * from './types';

export {
  ReceiptExtractionPipeline,
  DEFAULT_PIPELINE_CONFIG,
} from './services/pipeline/receipt-pipeline';
export type {
  ReceiptPipelineConfig,
  ReceiptPipelineDependencies,
  BatchDocument,
  BatchResult,
} from './services/pipeline/receipt-pipeline';

export { MultiPassOcrOrchestrator, DIGIT_WHITELIST } from './services/ocr/multi-pass-ocr';
export { GoogleVisionOcrEngine } from './services/ocr/google-vision';
export { PdfDocumentReader, isPdf } from './services/ocr/pdf-document-reader';
export { ImagePreprocessor } from './services/ocr/image-preprocessor';
export { MockOcrEngine } from './services/ocr/mock-ocr-service';

export { splitSections, SECTION_MARKERS } from './services/extraction/text-sectioner';
export { MoneyTokenExtractor } from './services/extraction/money-token-extractor';
export { VendorExtractor } from './services/extraction/vendor-extractor';
export { DateExtractor } from './services/extraction/date-extractor';
export { TaxExtractor } from './services/extraction/tax-extractor';
export { TotalExtractor } from './services/extraction/total-extractor';
export { Currency, CurrencyExtractor } from './services/extraction/currency-extractor';
export { ReceiptParser } from './services/extraction/receipt-parser';

export { CategoryClassifier } from './services/classification/category-classifier';

export { QualityGate, DEFAULT_REVIEW_GATE_CONFIG } from './services/review/quality-gate';
export type { ReviewGateConfig, ReviewDecision } from './services/review/quality-gate';

export { DEFAULT_OCR_CONFIG, loadOcrConfigFromEnv, loadGoogleVisionCredentialsFromEnv } from './config/ocr-config';
export type { OcrConfig } from './config/ocr-config';
export { DEFAULT_SCORING_CONFIG, mergeScoringConfig } from './config/scoring-config';
export type { ScoringConfig, ScoringOverrides } from './config/scoring-config';
export { getDefaultReferenceData, buildReferenceData } from './config/reference-data';
export type { ReferenceData } from './config/reference-data';
