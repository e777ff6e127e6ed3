/**
 * Receipt Extraction Pipeline
 *
 * Entry point: bytes -> multi-pass OCR -> field extraction -> category ->
 * sales-tax rule and money coercion -> review gate. Stages report failures
 * as flags; the returned record is frozen and the promise never rejects.
 */

import { readFile } from 'fs/promises';
import { v4 as uuidv4 } from 'uuid';
import type { OcrEngine, OcrResult, PdfRasterizer, PdfTextLayerExtractor } from '@/types/ocr';
import type { BusinessContext, ExtractionRecord, ParsedReceiptFields } from '@/types/extraction';
import { emptyField } from '@/types/extraction';
import type { CategoryResult } from '@/types/category';
import { DEFAULT_OCR_CONFIG, loadOcrConfigFromEnv, type OcrConfig } from '@/config/ocr-config';
import { mergeScoringConfig, type ScoringConfig, type ScoringOverrides } from '@/config/scoring-config';
import { getDefaultReferenceData, type ReferenceData } from '@/config/reference-data';
import { errorName } from '@/utils/errors';
import { MultiPassOcrOrchestrator } from '../ocr/multi-pass-ocr';
import { GoogleVisionOcrEngine } from '../ocr/google-vision';
import { ReceiptParser, emptyParsedFields } from '../extraction/receipt-parser';
import { Currency } from '../extraction/currency-extractor';
import { CategoryClassifier } from '../classification/category-classifier';
import { QualityGate, type ReviewGateConfig } from '../review/quality-gate';
import { applySalesTaxStateRule } from '../review/sales-tax-rules';
import { coerceMoneyField } from '../review/money-coercion';

export interface ReceiptPipelineConfig {
  ocr: Partial<OcrConfig>;
  scoring: ScoringOverrides;
  reviewGate: Partial<ReviewGateConfig>;
  referenceDate?: Date;           // fixed "today" for date plausibility
  ocrTimeoutMs?: number;
  concurrency: number;            // documents in flight for extractMany
  defaultCurrency: Currency;
  enableDebugLogging: boolean;
}

export const DEFAULT_PIPELINE_CONFIG: ReceiptPipelineConfig = {
  ocr: DEFAULT_OCR_CONFIG,
  scoring: {},
  reviewGate: {},
  concurrency: 4,
  defaultCurrency: Currency.USD,
  enableDebugLogging: false,
};

export interface ReceiptPipelineDependencies {
  engine?: OcrEngine;
  pdfText?: PdfTextLayerExtractor;
  pdfRasterizer?: PdfRasterizer;
  referenceData?: ReferenceData;
}

export interface BatchDocument {
  documentId?: string;
  bytes: Buffer;
  language?: string;
  context?: BusinessContext;
}

export interface BatchResult {
  documentId: string;
  record: ExtractionRecord;
}

function failedOcr(sourceTag: string): OcrResult {
  return { text: '', status: 'failed', sourceTag, confidence: 0 };
}

function freezeRecord(record: ExtractionRecord): ExtractionRecord {
  Object.freeze(record.ocr);
  Object.freeze(record.vendor);
  Object.freeze(record.date);
  Object.freeze(record.tax);
  Object.freeze(record.total);
  Object.freeze(record.category);
  Object.freeze(record.flags);
  return Object.freeze(record);
}

export class ReceiptExtractionPipeline {
  private readonly config: ReceiptPipelineConfig;
  private readonly scoring: ScoringConfig;
  private readonly orchestrator: MultiPassOcrOrchestrator;
  private readonly parser: ReceiptParser;
  private readonly classifier: CategoryClassifier;
  private readonly gate: QualityGate;

  constructor(dependencies: ReceiptPipelineDependencies = {}, config: Partial<ReceiptPipelineConfig> = {}) {
    this.config = { ...DEFAULT_PIPELINE_CONFIG, ...config };
    this.scoring = mergeScoringConfig(this.config.scoring);

    const referenceData = dependencies.referenceData ?? getDefaultReferenceData();
    const debug = this.config.enableDebugLogging;

    this.orchestrator = new MultiPassOcrOrchestrator(
      {
        engine: dependencies.engine ?? new GoogleVisionOcrEngine(),
        pdfText: dependencies.pdfText,
        pdfRasterizer: dependencies.pdfRasterizer,
      },
      { ...DEFAULT_OCR_CONFIG, ...this.config.ocr, enableDebugLogging: debug || (this.config.ocr.enableDebugLogging ?? false) },
      this.scoring.ocr
    );
    this.parser = new ReceiptParser({
      scoring: this.scoring,
      referenceData,
      referenceDate: this.config.referenceDate,
      defaultCurrency: this.config.defaultCurrency,
      enableDebugLogging: debug,
    });
    this.classifier = new CategoryClassifier(referenceData, this.scoring.category, debug);
    this.gate = new QualityGate(this.config.reviewGate);
  }

  /**
   * Pipeline wired to Google Cloud Vision with OCR_* and GOOGLE_CLOUD_*
   * settings from the environment.
   */
  static fromEnv(
    env: NodeJS.ProcessEnv = process.env,
    config: Partial<ReceiptPipelineConfig> = {}
  ): ReceiptExtractionPipeline {
    return new ReceiptExtractionPipeline({}, { ...config, ocr: { ...loadOcrConfigFromEnv(env), ...config.ocr } });
  }

  private get language(): string {
    return this.config.ocr.language ?? DEFAULT_OCR_CONFIG.language;
  }

  /**
   * Full extraction from image or PDF bytes. Never rejects.
   */
  async extract(bytes: Buffer, language: string = this.language, context: BusinessContext = {}): Promise<ExtractionRecord> {
    try {
      const ocr = await this.recognizeWithTimeout(bytes, language);
      return this.extractFromOcr(ocr, context);
    } catch (error) {
      console.error('❌ [ReceiptPipeline] Extraction failed:', error);
      return this.faultRecord(failedOcr(`fatal_exception:${errorName(error)}`));
    }
  }

  async extractFile(path: string, language: string = this.language, context: BusinessContext = {}): Promise<ExtractionRecord> {
    let bytes: Buffer;
    try {
      bytes = await readFile(path);
    } catch (error) {
      console.warn(`⚠️ [ReceiptPipeline] Could not read ${path}:`, error instanceof Error ? error.message : error);
      return this.extractFromOcr(failedOcr('file_read_failed'), context);
    }
    return this.extract(bytes, language, context);
  }

  /**
   * Extracts several documents with bounded concurrency. Results keep the
   * input order; documents without an id get a generated one.
   */
  async extractMany(documents: BatchDocument[]): Promise<BatchResult[]> {
    const results: BatchResult[] = [];
    const workers = Math.max(1, Math.min(this.config.concurrency, documents.length));
    let next = 0;

    const work = async (): Promise<void> => {
      while (next < documents.length) {
        const index = next++;
        const document = documents[index];
        const documentId = document.documentId ?? uuidv4();
        const record = await this.extract(document.bytes, document.language ?? this.language, document.context ?? {});
        results[index] = { documentId, record };
      }
    };

    await Promise.all(Array.from({ length: workers }, () => work()));
    return results;
  }

  /**
   * Post-OCR half of the pipeline. Deterministic for identical input.
   */
  extractFromOcr(ocr: OcrResult, context: BusinessContext = {}): ExtractionRecord {
    try {
      const upstreamFlags: string[] = [];

      const parsed = this.parser.parse(ocr.text);
      let fields: ParsedReceiptFields;
      if (parsed.ok) {
        fields = parsed.value;
      } else {
        fields = emptyParsedFields('field extraction failed');
        upstreamFlags.push(parsed.flag);
      }

      const salesTax = applySalesTaxStateRule(fields.tax, context.businessState);
      if (salesTax.flag) upstreamFlags.push(salesTax.flag);

      const total = coerceMoneyField(fields.total, 'TOTAL_REJECTED_IMPLAUSIBLE', this.scoring.money);
      if (total.flag) upstreamFlags.push(total.flag);
      const tax = coerceMoneyField(salesTax.tax, 'TAX_REJECTED_IMPLAUSIBLE', this.scoring.money);
      if (tax.flag) upstreamFlags.push(tax.flag);

      const explanation = context.explanation?.trim() || null;
      const categoryOutcome = this.classifier.classifySafely({
        vendor: fields.vendor.value,
        ocrText: explanation ?? ocr.text,
        explanation,
        businessType: context.businessType,
      });
      let category: CategoryResult;
      if (categoryOutcome.ok) {
        category = categoryOutcome.value;
      } else {
        category = { category: null, confidence: 0, reasoning: 'category engine error', source: 'engine' };
        upstreamFlags.push(categoryOutcome.flag);
      }

      const decision = this.gate.evaluate({
        ocr,
        vendor: fields.vendor,
        date: fields.date,
        tax: tax.field,
        total: total.field,
        category,
        upstreamFlags,
      });

      return freezeRecord({
        ocr: { ...ocr },
        vendor: { ...fields.vendor },
        date: { ...fields.date },
        tax: { ...tax.field },
        total: { ...total.field },
        category: { ...category },
        currency: fields.currency,
        flags: decision.flags,
        needsReview: decision.needsReview,
      });
    } catch (error) {
      console.error('❌ [ReceiptPipeline] Post-OCR stage failed:', error);
      return this.faultRecord(ocr);
    }
  }

  private async recognizeWithTimeout(bytes: Buffer, language: string): Promise<OcrResult> {
    const timeoutMs = this.config.ocrTimeoutMs;
    const recognition = this.orchestrator.recognizeDocument(bytes, language);
    if (timeoutMs === undefined || timeoutMs <= 0) {
      return recognition;
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<OcrResult>((resolve) => {
      timer = setTimeout(() => {
        console.warn(`⚠️ [ReceiptPipeline] OCR exceeded ${timeoutMs}ms`);
        resolve(failedOcr('ocr_timeout'));
      }, timeoutMs);
    });

    try {
      return await Promise.race([recognition, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private faultRecord(ocr: OcrResult): ExtractionRecord {
    return freezeRecord({
      ocr: { ...ocr },
      vendor: emptyField('pipeline fault'),
      date: emptyField('pipeline fault'),
      tax: emptyField('pipeline fault'),
      total: emptyField('pipeline fault'),
      category: { category: null, confidence: 0, reasoning: 'pipeline fault', source: 'engine' },
      currency: null,
      flags: ['PIPELINE_FAULT'],
      needsReview: true,
    });
  }
}
