/**
 * End-to-end extraction.
 *
 * Sample receipts:
 *   AutoZone:      labeled tax and grand total, date label, known vendor
 *   Corner market: subtotal and weak "Total" only, tax inferred
 *   Shop Rite:     keywords without any amounts
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import sharp from 'sharp';
import { ReceiptExtractionPipeline } from '@/services/pipeline/receipt-pipeline';
import { MockOcrEngine } from '@/services/ocr/mock-ocr-service';
import { VendorExtractor } from '@/services/extraction/vendor-extractor';
import type { OcrEngine, OcrResult, PdfRasterizer, PdfTextLayerExtractor } from '@/types/ocr';
import type { ExtractionRecord } from '@/types/extraction';

const AUTOZONE_TEXT = ['AUTOZONE STORE #5432', 'DATE: 03/14/2026', 'SUBTOTAL 42.00', 'TAX $3.12', 'GRAND TOTAL $45.12'].join('\n');
const CORNER_MARKET_TEXT = 'CORNER MARKET\nSubtotal 20.00\nTotal 21.50';
const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

const referenceDate = new Date('2026-10-18T12:00:00Z');

function ocrOf(text: string): OcrResult {
  return { text, status: 'success', sourceTag: 'test', confidence: 90 };
}

function pipelineWith(engine: OcrEngine = new MockOcrEngine(''), extra: { pdfText?: PdfTextLayerExtractor; pdfRasterizer?: PdfRasterizer } = {}) {
  return new ReceiptExtractionPipeline({ engine, ...extra }, { referenceDate, ocr: { enableRectify: false } });
}

function expectReviewMatchesFlags(record: ExtractionRecord): void {
  expect(record.needsReview).toBe(record.flags.length > 0);
}

class FakePdfText implements PdfTextLayerExtractor {
  constructor(private readonly text: string) {}

  async extractEmbeddedText(): Promise<string> {
    return this.text;
  }
}

describe('ReceiptExtractionPipeline', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('extractFromOcr', () => {
    const pipeline = pipelineWith();

    it('extracts a clean receipt without review', () => {
      const record = pipeline.extractFromOcr(ocrOf(AUTOZONE_TEXT));

      expect(record.vendor).toEqual({
        value: 'AutoZone',
        confidence: 91,
        reasoning: "Matched vendor alias 'autozone' in alias_match:top_full.",
        provenance: 'alias_match:top_full',
      });
      expect(record.date.value).toBe('2026-03-14');
      expect(record.date.confidence).toBe(90);
      expect(record.tax.value).toBe(3.12);
      expect(record.tax.confidence).toBe(73);
      expect(record.total.value).toBe(45.12);
      expect(record.total.confidence).toBe(100);
      expect(record.total.provenance).toBe('strong_label');
      expect(record.category).toEqual({
        category: 'Car & Truck',
        confidence: 0.95,
        reasoning: "Vendor mapping matched: 'AutoZone' in 'AutoZone'",
        source: 'rules',
      });
      expect(record.currency).toBe('USD');
      expect(record.flags).toEqual([]);
      expect(record.needsReview).toBe(false);
    });

    it('infers tax and flags the weak total label', () => {
      const record = pipeline.extractFromOcr(ocrOf(CORNER_MARKET_TEXT));

      expect(record.tax.value).toBe(1.5);
      expect(record.tax.provenance).toBe('inferred_total_minus_subtotal');
      expect(record.total.value).toBe(21.5);
      expect(record.total.confidence).toBe(96);
      expect(record.vendor.value).toBe('CORNER MARKET');
      expect(record.currency).toBeNull();
      expect(record.flags).toEqual([
        'TOTAL_CONTEXT_WEAK',
        'LOW_DATE_CONFIDENCE',
        'LOW_VENDOR_CONFIDENCE',
        'MISSING_DATE',
        'MISSING_CATEGORY',
      ]);
      expectReviewMatchesFlags(record);
    });

    it('flags a receipt whose amounts were lost', () => {
      const record = pipeline.extractFromOcr(ocrOf('SHOP RITE\nTOTAL\nTAX\nTHANK YOU'));

      expect(record.total).toEqual({ value: null, confidence: 0, reasoning: 'no money candidates found', provenance: null });
      expect(record.vendor.value).toBe('SHOP RITE');
      expect(record.vendor.confidence).toBe(45.6);
      expect(record.flags).toEqual([
        'LOW_TOTAL_CONFIDENCE',
        'LOW_DATE_CONFIDENCE',
        'LOW_VENDOR_CONFIDENCE',
        'TAX_MISSING_REVIEW',
        'MISSING_DATE',
        'MISSING_TOTAL',
        'MISSING_CATEGORY',
      ]);
      expect(record.needsReview).toBe(true);
    });

    it('does not find a brand inside an ordinary word', () => {
      const subpanel = pipeline.extractFromOcr(
        ocrOf("JOE'S HARDWARE\nDATE: 10/01/2026\nSUBPANEL 200A 89.99\nTAX 5.40\nGRAND TOTAL 95.39")
      );
      expect(subpanel.vendor.value).toBe("JOE'S HARDWARE");
      expect(subpanel.vendor.confidence).toBe(45.6);
      expect(subpanel.category).toEqual({
        category: 'Equipment',
        confidence: 0.8,
        reasoning: "OCR rule: Keyword mapping matched: 'hardware'",
        source: 'rules',
      });
      expect(subpanel.flags).toEqual(['LOW_VENDOR_CONFIDENCE']);
      expect(subpanel.needsReview).toBe(true);

      const processor = pipeline.extractFromOcr(
        ocrOf('MICRO CENTER\nDATE: 10/02/2026\nINTEL PROCESSOR 289.99\nTAX 17.40\nGRAND TOTAL 307.39')
      );
      expect(processor.vendor.value).toBe('MICRO CENTER');
      expect(processor.category.category).toBeNull();
      expect(processor.flags).toEqual(['LOW_VENDOR_CONFIDENCE', 'MISSING_CATEGORY']);
    });

    it('never reads identifiers as totals', () => {
      expect(pipeline.extractFromOcr(ocrOf('797.860')).total.value).toBeNull();
      expect(pipeline.extractFromOcr(ocrOf('ITEM 797860')).total.value).toBeNull();
    });

    it('drops tax for a business in a no-sales-tax state', () => {
      const record = pipeline.extractFromOcr(ocrOf(AUTOZONE_TEXT), { businessState: 'or' });

      expect(record.tax.value).toBeNull();
      expect(record.flags).toEqual(['NO_SALES_TAX_STATE']);
      expect(record.needsReview).toBe(true);
    });

    it('rejects an implausible total', () => {
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const record = pipeline.extractFromOcr(ocrOf('AUTOZONE\nGRAND TOTAL $12000.00'));

      expect(record.total.value).toBeNull();
      expect(record.total.reasoning).toBe('rejected implausible amount 12000');
      expect(record.flags).toContain('TOTAL_REJECTED_IMPLAUSIBLE');
      expect(record.flags).toContain('MISSING_TOTAL');
    });

    it('uses the explanation for the category', () => {
      const record = pipeline.extractFromOcr(ocrOf(CORNER_MARKET_TEXT), { explanation: 'lunch with a client' });
      expect(record.category.category).toBe('Meals');
      expect(record.category.reasoning).toBe("Explanation rule: Keyword mapping matched: 'lunch'");
    });

    it('turns a parser failure into a flag', () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      vi.spyOn(VendorExtractor.prototype, 'extract').mockImplementation(() => {
        throw new TypeError('bad input');
      });

      const record = pipeline.extractFromOcr(ocrOf(AUTOZONE_TEXT));

      expect(record.flags).toContain('PARSER_EXCEPTION_TYPEERROR');
      expect(record.total.reasoning).toBe('field extraction failed');
      expect(record.needsReview).toBe(true);
    });

    it('is deterministic and returns frozen records', () => {
      const first = pipeline.extractFromOcr(ocrOf(AUTOZONE_TEXT));
      const second = pipeline.extractFromOcr(ocrOf(AUTOZONE_TEXT));

      expect(second).toEqual(first);
      expect(Object.isFrozen(first)).toBe(true);
      expect(Object.isFrozen(first.flags)).toBe(true);
      expect(Object.isFrozen(first.total)).toBe(true);
    });
  });

  describe('extract', () => {
    it('runs OCR and extraction on an image', async () => {
      const block = await sharp({ create: { width: 200, height: 50, channels: 3, background: '#000000' } }).png().toBuffer();
      const image = await sharp({ create: { width: 800, height: 1200, channels: 3, background: '#ffffff' } })
        .composite([{ input: block, top: 100, left: 100 }])
        .png()
        .toBuffer();
      const engine = new MockOcrEngine((call) => {
        if (call.height === 384) return 'AUTOZONE';
        if (call.width === 800) return AUTOZONE_TEXT;
        return 'GRAND TOTAL $45.12';
      });

      const record = await pipelineWith(engine).extract(image);

      expect(record.ocr.status).toBe('low_confidence');
      expect(record.vendor.value).toBe('AutoZone');
      expect(record.vendor.provenance).toBe('alias_match:vendor_pass');
      expect(record.vendor.confidence).toBe(97);
      expect(record.total.value).toBe(45.12);
      expect(record.tax.value).toBe(3.12);
      expect(record.flags).toEqual([]);
    });

    it('returns a failed record when OCR exceeds the timeout', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      let release: () => void = () => undefined;
      const stalled = new Promise<void>((resolve) => {
        release = resolve;
      });
      const pdfRasterizer: PdfRasterizer = {
        rasterize: async () => {
          await stalled;
          return [];
        },
      };
      const pipeline = new ReceiptExtractionPipeline(
        { engine: new MockOcrEngine(''), pdfText: new FakePdfText(''), pdfRasterizer },
        { ocrTimeoutMs: 20 }
      );

      const record = await pipeline.extract(Buffer.from('%PDF-1.4 slow'));
      release();

      expect(record.ocr).toEqual({ text: '', status: 'failed', sourceTag: 'ocr_timeout', confidence: 0 });
      expect(record.flags[0]).toBe('OCR_FAILED');
      expect(record.needsReview).toBe(true);
    });

    it('reports unreadable files', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const record = await pipelineWith().extractFile('/nonexistent/receipt.png');

      expect(record.ocr.sourceTag).toBe('file_read_failed');
      expect(record.flags).toContain('OCR_FAILED');
      expectReviewMatchesFlags(record);
    });
  });

  describe('extractMany', () => {
    it('keeps input order and generates missing ids', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const pipeline = pipelineWith(new MockOcrEngine(''), { pdfText: new FakePdfText(AUTOZONE_TEXT) });

      const results = await pipeline.extractMany([
        { documentId: 'doc-a', bytes: Buffer.from('not an image') },
        { bytes: Buffer.from('%PDF-1.4 receipt') },
      ]);

      expect(results).toHaveLength(2);
      expect(results[0].documentId).toBe('doc-a');
      expect(results[0].record.ocr.sourceTag).toBe('image_load_failed');
      expect(results[1].documentId).toMatch(UUID_V4);
      expect(results[1].record.ocr.sourceTag).toBe('pdf_text');
      expect(results[1].record.total.value).toBe(45.12);
      results.forEach(({ record }) => expectReviewMatchesFlags(record));
    });
  });
});
