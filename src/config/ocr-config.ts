/**
 * OCR Configuration
 *
 * Feature toggles and caps for the multi-pass orchestrator. Defaults match a
 * typical deployment; `loadOcrConfigFromEnv` reads the OCR_* variables.
 */

export interface OcrConfig {
  language: string;               // engine language code, e.g. 'eng'
  enableRectify: boolean;
  enablePdfText: boolean;
  maxPdfPages: number;
  pdfRenderScale: number;
  enableDebugLogging: boolean;
}

export const DEFAULT_OCR_CONFIG: OcrConfig = {
  language: 'eng',
  enableRectify: true,
  enablePdfText: true,
  maxPdfPages: 10,
  pdfRenderScale: 2,
  enableDebugLogging: false,
};

export interface GoogleVisionCredentialsConfig {
  projectId?: string;
  keyFilename?: string;
  clientEmail?: string;
  privateKey?: string;
}

const TRUTHY = new Set(['1', 'true', 'yes', 'y']);

function readFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return TRUTHY.has(value.trim().toLowerCase());
}

function readPositiveInt(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function loadOcrConfigFromEnv(env: NodeJS.ProcessEnv = process.env): OcrConfig {
  return {
    ...DEFAULT_OCR_CONFIG,
    language: env.OCR_LANGUAGE?.trim() || DEFAULT_OCR_CONFIG.language,
    enableRectify: readFlag(env.OCR_ENABLE_RECTIFY, DEFAULT_OCR_CONFIG.enableRectify),
    enablePdfText: readFlag(env.OCR_ENABLE_PDF_TEXT, DEFAULT_OCR_CONFIG.enablePdfText),
    maxPdfPages: readPositiveInt(env.OCR_MAX_PDF_PAGES, DEFAULT_OCR_CONFIG.maxPdfPages),
    enableDebugLogging: readFlag(env.OCR_DEBUG, DEFAULT_OCR_CONFIG.enableDebugLogging),
  };
}

export function loadGoogleVisionCredentialsFromEnv(
  env: NodeJS.ProcessEnv = process.env
): GoogleVisionCredentialsConfig {
  return {
    projectId: env.GOOGLE_CLOUD_PROJECT_ID,
    keyFilename: env.GOOGLE_CLOUD_KEY_FILE,
    clientEmail: env.GOOGLE_CLOUD_CLIENT_EMAIL,
    // keys stored in env files carry escaped newlines
    privateKey: env.GOOGLE_CLOUD_PRIVATE_KEY?.replace(/\\n/g, '\n'),
  };
}
