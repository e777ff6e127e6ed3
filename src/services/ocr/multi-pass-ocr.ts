/**
 * Multi-Pass OCR Orchestrator
 *
 * Runs the engine several times per image (full page, vendor strip, totals
 * strip and the conditional numeric/soft-text passes), keeps the best
 * attempt of each pass by text quality and merges them behind section
 * markers. PDFs use their embedded text layer when it is usable and fall
 * back to rasterized pages.
 *
 * Never throws: every failure becomes an OcrResult with status 'failed'.
 */

import sharp from 'sharp';
import type {
  ImagePipelineResult,
  ImageVariant,
  OcrEngine,
  OcrResult,
  PageSegMode,
  PassAttempt,
  PdfRasterizer,
  PdfTextLayerExtractor,
} from '@/types/ocr';
import { DEFAULT_OCR_CONFIG, type OcrConfig } from '@/config/ocr-config';
import { DEFAULT_SCORING_CONFIG, type OcrQualityScoring } from '@/config/scoring-config';
import { errorName } from '@/utils/errors';
import { ImagePreprocessor } from './image-preprocessor';
import { PdfDocumentReader, isPdf } from './pdf-document-reader';
import {
  cleanupText,
  hasMoneyTokens,
  hasTotalishKeywords,
  looksLikeTotalsMissing,
  looksLikeVendorLettersMissing,
  scoreToConfidence,
  statusFromConfidence,
  textQualityScore,
} from './text-quality';
import { PAGE_BREAK, SECTION_MARKERS } from '../extraction/text-sectioner';

export const DIGIT_WHITELIST = '0123456789.$:/- ';

export interface MultiPassOcrDependencies {
  engine: OcrEngine;
  pdfText?: PdfTextLayerExtractor;
  pdfRasterizer?: PdfRasterizer;
}

function failedResult(sourceTag: string): OcrResult {
  return { text: '', status: 'failed', sourceTag, confidence: 0 };
}

function roundConfidence(value: number): number {
  return Math.round(Math.max(0, Math.min(100, value)) * 10) / 10;
}

export class MultiPassOcrOrchestrator {
  private readonly engine: OcrEngine;
  private readonly pdfText: PdfTextLayerExtractor;
  private readonly pdfRasterizer: PdfRasterizer;
  private readonly config: OcrConfig;
  private readonly scoring: OcrQualityScoring;
  private readonly preprocessor: ImagePreprocessor;

  constructor(
    dependencies: MultiPassOcrDependencies,
    config: Partial<OcrConfig> = {},
    scoring: OcrQualityScoring = DEFAULT_SCORING_CONFIG.ocr
  ) {
    this.config = { ...DEFAULT_OCR_CONFIG, ...config };
    this.scoring = scoring;
    this.engine = dependencies.engine;

    const reader = new PdfDocumentReader(this.config.pdfRenderScale);
    this.pdfText = dependencies.pdfText ?? reader;
    this.pdfRasterizer = dependencies.pdfRasterizer ?? reader;

    this.preprocessor = new ImagePreprocessor({
      enableRectify: this.config.enableRectify,
      enableDebugLogging: this.config.enableDebugLogging,
    });
  }

  private debugLog(phase: string, data: unknown): void {
    if (this.config.enableDebugLogging) {
      console.log(`🔍 [MultiPassOCR] ${phase}:`, data);
    }
  }

  /**
   * Recognize an image or PDF document.
   */
  async recognizeDocument(bytes: Buffer, language: string = this.config.language): Promise<OcrResult> {
    try {
      if (isPdf(bytes)) {
        return await this.recognizePdf(bytes, language);
      }
      return await this.recognizeImage(bytes, language);
    } catch (error) {
      console.error('❌ [MultiPassOCR] Fatal OCR failure:', error);
      return failedResult(`fatal_exception:${errorName(error)}`);
    }
  }

  private async recognizeImage(bytes: Buffer, language: string): Promise<OcrResult> {
    try {
      await sharp(bytes).metadata();
    } catch (error) {
      console.warn('⚠️ [MultiPassOCR] Image could not be decoded:', error instanceof Error ? error.message : error);
      return failedResult('image_load_failed');
    }

    const pipeline = await this.runImagePipeline(bytes, language, 'img');
    const text = cleanupText(pipeline.text);
    if (!text) {
      return failedResult(`${pipeline.source}|empty`);
    }

    const confidence = roundConfidence(pipeline.confidence);
    return {
      text,
      status: statusFromConfidence(confidence, this.scoring),
      sourceTag: pipeline.source,
      confidence,
    };
  }

  private async recognizePdf(bytes: Buffer, language: string): Promise<OcrResult> {
    if (this.config.enablePdfText) {
      try {
        const embedded = cleanupText(await this.pdfText.extractEmbeddedText(bytes));
        if (embedded.trim().length >= this.scoring.pdfTextMinChars) {
          this.debugLog('PDF text layer accepted', { chars: embedded.length });
          return {
            text: embedded,
            status: 'success',
            sourceTag: 'pdf_text',
            confidence: this.scoring.pdfTextConfidence,
          };
        }
      } catch (error) {
        console.warn('⚠️ [MultiPassOCR] PDF text layer unavailable:', error instanceof Error ? error.message : error);
      }
    }

    let pages: Buffer[] = [];
    try {
      pages = await this.pdfRasterizer.rasterize(bytes, this.config.maxPdfPages);
    } catch (error) {
      console.warn('⚠️ [MultiPassOCR] PDF rasterization failed:', error instanceof Error ? error.message : error);
    }
    pages = pages.slice(0, this.config.maxPdfPages);
    if (pages.length === 0) {
      return failedResult('pdf_render_failed');
    }

    const texts: string[] = [];
    const sources: string[] = [];
    let confidence = 0;

    for (const [index, page] of pages.entries()) {
      const result = await this.runImagePipeline(page, language, `page${index + 1}`);
      sources.push(result.source);
      const text = cleanupText(result.text);
      if (text) {
        texts.push(text);
        confidence = Math.max(confidence, result.confidence);
      }
    }

    if (texts.length === 0) {
      return failedResult('pdf_ocr_empty');
    }

    const rounded = roundConfidence(confidence);
    return {
      text: texts.join(PAGE_BREAK),
      status: statusFromConfidence(rounded, this.scoring),
      sourceTag: `pdf_ocr:${sources.slice(0, 3).join(',')}`,
      confidence: rounded,
    };
  }

  /**
   * All passes for one image. Exceptions end the pipeline for this image with
   * an empty text instead of propagating.
   */
  async runImagePipeline(image: Buffer, language: string, tag: string): Promise<ImagePipelineResult> {
    try {
      const prepared = await this.preprocessor.prepare(image);
      const sources: string[] = [];
      if (prepared.rectified) sources.push('rectify');

      const { denoise, sharp: sharpened } = await this.preprocessor.fullPageVariants(prepared);
      const fullPage = [denoise, sharpened];

      // Base pass text goes in unmarked; cleanup happens on the merged text
      const base = await this.bestByQuality(tag, 'base', fullPage, [6, 11], undefined, language);
      const baseText = cleanupText(base.text);
      let merged = base.text;
      let confidence = scoreToConfidence(base.score);
      sources.push(`base:${base.source}`);

      const append = (marker: string, text: string): void => {
        merged = `${merged}\n\n${marker}\n${text}`;
      };

      const vendor = await this.bestByQuality(tag, 'vendor', [await this.preprocessor.vendorStrip(prepared)], [7, 6], undefined, language);
      const vendorText = cleanupText(vendor.text);
      if (vendorText) {
        append(SECTION_MARKERS.vendor, vendorText);
        confidence = Math.max(confidence, scoreToConfidence(vendor.score, 0, this.scoring.vendorPassCap));
        sources.push(`vendor:${vendor.source}`);
      }

      const mixed = await this.bestByQuality(tag, 'right_mixed', [await this.preprocessor.rightStripMixed(prepared)], [6, 11], undefined, language);
      const mixedText = cleanupText(mixed.text);
      if (mixedText) {
        append(SECTION_MARKERS.totalsMixed, mixedText);
        confidence = Math.max(
          confidence,
          scoreToConfidence(mixed.score, this.scoring.rightMixedBump, this.scoring.rightMixedCap)
        );
        sources.push(`right_mixed:${mixed.source}`);
      }

      if (!mixedText || (!hasMoneyTokens(mixedText) && !hasTotalishKeywords(mixedText))) {
        const digits = await this.bestByQuality(
          tag,
          'right_digits',
          [await this.preprocessor.rightStripDigits(prepared)],
          [6, 7],
          DIGIT_WHITELIST,
          language
        );
        const digitsText = cleanupText(digits.text);
        if (digitsText) {
          append(SECTION_MARKERS.totalsDigits, digitsText);
          confidence = Math.max(
            confidence,
            scoreToConfidence(digits.score, this.scoring.rightDigitsBump, this.scoring.rightDigitsCap)
          );
          sources.push(`right_digits:${digits.source}`);
        }
      }

      if (looksLikeTotalsMissing(baseText)) {
        const numeric = await this.bestByQuality(tag, 'numeric', fullPage, [6, 11], DIGIT_WHITELIST, language);
        const numericText = cleanupText(numeric.text);
        if (numericText) {
          append(SECTION_MARKERS.numeric, numericText);
          confidence = Math.max(
            confidence,
            scoreToConfidence(numeric.score, this.scoring.numericPassBump, this.scoring.numericPassCap)
          );
          sources.push(`digits:${numeric.source}`);
        }
      }

      if (looksLikeVendorLettersMissing(baseText)) {
        const soft = await this.bestByQuality(tag, 'soft', [await this.preprocessor.softText(denoise)], [6], undefined, language);
        const softText = cleanupText(soft.text);
        if (softText) {
          append(SECTION_MARKERS.softText, softText);
          confidence = Math.max(confidence, scoreToConfidence(soft.score, 0, this.scoring.softTextCap));
          sources.push(`soft:${soft.source}`);
        }
      }

      this.debugLog('Image pipeline complete', { tag, confidence, sources });

      return {
        text: cleanupText(merged),
        confidence: Math.max(0, Math.min(100, confidence)),
        source: sources.join('+'),
      };
    } catch (error) {
      console.warn(`⚠️ [MultiPassOCR] Image pipeline failed for ${tag}:`, error instanceof Error ? error.message : error);
      return { text: '', confidence: 0, source: `${tag}_pipeline_exception:${errorName(error)}` };
    }
  }

  /**
   * Tries every variant with every page segmentation mode and keeps the
   * strictly best quality score, stopping early once it is good enough.
   */
  async bestByQuality(
    tag: string,
    pass: string,
    variants: ImageVariant[],
    pageSegModes: PageSegMode[],
    charWhitelist: string | undefined,
    language: string
  ): Promise<PassAttempt> {
    let best: PassAttempt = { text: '', score: 0, source: `${tag}_${pass}_none` };

    for (const variant of variants) {
      for (const mode of pageSegModes) {
        const source = `${tag}_${pass}_${variant.name}_psm${mode}${charWhitelist ? '_wl' : ''}`;
        let text = '';
        try {
          text = await this.engine.recognize(variant.image, mode, charWhitelist, language);
        } catch (error) {
          console.warn(`⚠️ [MultiPassOCR] Engine failed on ${source}:`, error instanceof Error ? error.message : error);
        }

        const score = textQualityScore(cleanupText(text));
        if (score > best.score) {
          best = { text, score, source };
        }
        if (best.score >= this.scoring.earlyExitScore) {
          this.debugLog('Early exit', { source: best.source, score: best.score });
          return best;
        }
      }
    }

    return best;
  }
}
