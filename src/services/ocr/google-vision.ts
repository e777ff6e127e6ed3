// Google Cloud Vision OCR engine
import { ImageAnnotatorClient } from '@google-cloud/vision';
import type { OcrEngine, PageSegMode } from '@/types/ocr';
import {
  loadGoogleVisionCredentialsFromEnv,
  type GoogleVisionCredentialsConfig,
} from '@/config/ocr-config';

export type VisionFeature = 'document_text' | 'text';

// Engine language codes -> Vision language hints
const LANGUAGE_HINTS: Record<string, string> = {
  eng: 'en',
  fin: 'fi',
  swe: 'sv',
  fra: 'fr',
  deu: 'de',
  ita: 'it',
  spa: 'es',
};

export class GoogleVisionOcrEngine implements OcrEngine {
  private client: ImageAnnotatorClient;

  constructor(
    credentials: GoogleVisionCredentialsConfig = loadGoogleVisionCredentialsFromEnv(),
    client?: ImageAnnotatorClient
  ) {
    this.client = client ?? new ImageAnnotatorClient({
      projectId: credentials.projectId,
      keyFilename: credentials.keyFilename, // or use credentials object
      credentials: credentials.privateKey && credentials.clientEmail ? {
        client_email: credentials.clientEmail,
        private_key: credentials.privateKey,
      } : undefined,
    });
  }

  /**
   * Block layouts (psm 6) go through document text detection; single lines
   * and sparse text use plain text detection.
   */
  static featureForMode(pageSegMode: PageSegMode): VisionFeature {
    return pageSegMode === 6 ? 'document_text' : 'text';
  }

  static languageHints(language?: string): string[] {
    if (!language) return [];
    return language
      .split('+')
      .map((code) => code.trim().toLowerCase())
      .filter(Boolean)
      .map((code) => LANGUAGE_HINTS[code] ?? code.slice(0, 2));
  }

  // Vision has no character whitelist; drop everything else after recognition
  static applyWhitelist(text: string, charWhitelist?: string): string {
    if (!charWhitelist) return text;
    const allowed = new Set(charWhitelist.split(''));
    return text
      .split('\n')
      .map((line) => line.split('').filter((ch) => allowed.has(ch)).join(''))
      .join('\n');
  }

  async recognize(
    image: Buffer,
    pageSegMode: PageSegMode,
    charWhitelist?: string,
    language?: string
  ): Promise<string> {
    try {
      const request = {
        image: {
          content: image.toString('base64'),
        },
        imageContext: {
          languageHints: GoogleVisionOcrEngine.languageHints(language),
        },
      };

      let text = '';
      if (GoogleVisionOcrEngine.featureForMode(pageSegMode) === 'document_text') {
        const [result] = await this.client.documentTextDetection(request);
        text = result.fullTextAnnotation?.text ?? '';
      } else {
        const [result] = await this.client.textDetection(request);
        const detections = result.textAnnotations ?? [];
        // First annotation contains full text
        text = detections.length > 0 ? detections[0].description ?? '' : '';
      }

      return GoogleVisionOcrEngine.applyWhitelist(text, charWhitelist);
    } catch (error) {
      console.error('❌ [GoogleVision] OCR request failed:', error);
      return '';
    }
  }
}
