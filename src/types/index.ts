/**
 * Central types export file
 */

export type {
  OcrStatus,
  PageSegMode,
  OcrResult,
  OcrEngine,
  PdfTextLayerExtractor,
  PdfRasterizer,
  ImageVariant,
  PassAttempt,
  ImagePipelineResult,
} from './ocr';

export type {
  SectionName,
  SectionedText,
  MoneyEncoding,
  MoneyScanMode,
  MoneyToken,
  FieldResult,
  BusinessContext,
  ParsedReceiptFields,
  ExtractionRecord,
  StageOutcome,
} from './extraction';

export { emptyField } from './extraction';

export type { CategorySource, CategoryResult, CategoryInput } from './category';
