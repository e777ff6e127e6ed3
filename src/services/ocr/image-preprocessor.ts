/**
 * Image Preprocessor
 *
 * Orients, resizes and optionally rectifies (deskew, then crop to the paper)
 * a receipt photo, then renders the
 * grayscale variants and crops each OCR pass works on. Every output is a PNG
 * buffer so any engine can consume it.
 */

import sharp from 'sharp';
import type { ImageVariant } from '@/types/ocr';

export interface PreparedImage {
  image: Buffer;
  width: number;
  height: number;
  rectified: boolean;
}

export interface ImagePreprocessorOptions {
  enableRectify: boolean;
  enableDebugLogging: boolean;
}

export class ImagePreprocessor {
  static readonly MAX_SIDE = 2000;
  static readonly MIN_SIDE = 1200;
  static readonly UPSCALE_TARGET = 1400;
  static readonly TOP_STRIP_FRACTION = 0.32;
  static readonly RIGHT_STRIP_FRACTION = 0.42;
  // rectified crops smaller than this share of the page are rejected
  static readonly MIN_RECTIFY_AREA = 0.5;
  static readonly MAX_SKEW_DEGREES = 10;
  static readonly SKEW_STEP_DEGREES = 0.5;
  static readonly SKEW_SAMPLE_SIDE = 400;
  static readonly DARK_THRESHOLD = 128;

  constructor(private readonly options: ImagePreprocessorOptions) {}

  /**
   * Auto-orient, bring the longest side into [1200, 2000] and, when
   * rectification is enabled, straighten the text lines and trim uniform
   * background borders.
   */
  async prepare(input: Buffer): Promise<PreparedImage> {
    const oriented = await sharp(input).rotate().png().toBuffer({ resolveWithObject: true });
    let image = oriented.data;
    let { width, height } = oriented.info;

    const longest = Math.max(width, height);
    let scale = 1;
    if (longest > ImagePreprocessor.MAX_SIDE) {
      scale = ImagePreprocessor.MAX_SIDE / longest;
    } else if (longest < ImagePreprocessor.MIN_SIDE) {
      scale = ImagePreprocessor.UPSCALE_TARGET / longest;
    }

    if (scale !== 1) {
      const resized = await sharp(image)
        .resize(Math.max(1, Math.floor(width * scale)), Math.max(1, Math.floor(height * scale)), {
          fit: 'fill',
          kernel: scale < 1 ? 'lanczos3' : 'cubic',
        })
        .png()
        .toBuffer({ resolveWithObject: true });
      image = resized.data;
      width = resized.info.width;
      height = resized.info.height;
    }

    let rectified = false;
    if (this.options.enableRectify) {
      const trimmed = await this.tryRectify(image, width, height);
      if (trimmed) {
        image = trimmed.image;
        width = trimmed.width;
        height = trimmed.height;
        rectified = true;
      }
    }

    if (this.options.enableDebugLogging) {
      console.log(`🖼️ [ImagePreprocessor] Prepared ${width}x${height} (scale ${scale.toFixed(2)}, rectified: ${rectified})`);
    }

    return { image, width, height, rectified };
  }

  /**
   * Clockwise rotation of the text lines in degrees, found by shearing the
   * dark pixels of a downscaled copy and keeping the angle whose row
   * histogram is most concentrated.
   */
  async estimateSkew(image: Buffer): Promise<number> {
    const { data, info } = await sharp(image)
      .grayscale()
      .resize({
        width: ImagePreprocessor.SKEW_SAMPLE_SIDE,
        height: ImagePreprocessor.SKEW_SAMPLE_SIDE,
        fit: 'inside',
        withoutEnlargement: true,
      })
      .raw()
      .toBuffer({ resolveWithObject: true });
    const { width, height, channels } = info;

    const xs: number[] = [];
    const ys: number[] = [];
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        if (data[(y * width + x) * channels] < ImagePreprocessor.DARK_THRESHOLD) {
          xs.push(x - width / 2);
          ys.push(y);
        }
      }
    }
    if (xs.length === 0) return 0;

    const offset = Math.ceil(width / 2) + 1;
    const bins = new Int32Array(height + 2 * offset + 1);
    const steps = Math.round(ImagePreprocessor.MAX_SKEW_DEGREES / ImagePreprocessor.SKEW_STEP_DEGREES);
    let bestAngle = 0;
    let bestScore = -1;

    for (let step = -steps; step <= steps; step++) {
      const angle = step * ImagePreprocessor.SKEW_STEP_DEGREES;
      const slope = Math.tan((angle * Math.PI) / 180);
      bins.fill(0);
      for (let i = 0; i < xs.length; i++) {
        bins[Math.round(ys[i] - xs[i] * slope) + offset] += 1;
      }

      let score = 0;
      for (const count of bins) score += count * count;
      if (score > bestScore) {
        bestScore = score;
        bestAngle = angle;
      }
    }

    return bestAngle;
  }

  private async tryRectify(
    image: Buffer,
    width: number,
    height: number
  ): Promise<{ image: Buffer; width: number; height: number } | null> {
    try {
      const skew = await this.estimateSkew(image);
      let current = { image, width, height };
      if (skew !== 0) {
        const rotated = await sharp(image)
          .rotate(-skew, { background: '#ffffff' })
          .png()
          .toBuffer({ resolveWithObject: true });
        current = { image: rotated.data, width: rotated.info.width, height: rotated.info.height };
      }

      // Crop to the paper unless that would cut away most of the page
      const trimmed = await sharp(current.image).trim({ threshold: 24 }).png().toBuffer({ resolveWithObject: true });
      const area = trimmed.info.width * trimmed.info.height;
      const cropped =
        (trimmed.info.width !== current.width || trimmed.info.height !== current.height) &&
        area >= width * height * ImagePreprocessor.MIN_RECTIFY_AREA;
      if (cropped) {
        current = { image: trimmed.data, width: trimmed.info.width, height: trimmed.info.height };
      }

      if (skew === 0 && !cropped) {
        return null;
      }

      if (this.options.enableDebugLogging) {
        console.log(`🖼️ [ImagePreprocessor] Rectified: skew ${skew} deg, ${current.width}x${current.height}`);
      }
      return current;
    } catch (error) {
      console.warn('⚠️ [ImagePreprocessor] Rectification skipped:', error instanceof Error ? error.message : error);
      return null;
    }
  }

  private claheTile(size: number): number {
    return Math.max(3, Math.round(size / 8));
  }

  /**
   * Full-page variants: `denoise` (normalize + CLAHE + median) and `sharp`
   * (denoise + unsharp mask).
   */
  async fullPageVariants(prepared: PreparedImage): Promise<{ denoise: ImageVariant; sharp: ImageVariant }> {
    const denoise = await sharp(prepared.image)
      .grayscale()
      .normalize()
      .clahe({ width: this.claheTile(prepared.width), height: this.claheTile(prepared.height), maxSlope: 3 })
      .median(3)
      .png()
      .toBuffer();

    const sharpened = await sharp(denoise).sharpen({ sigma: 1 }).png().toBuffer();

    return {
      denoise: { name: 'denoise', image: denoise },
      sharp: { name: 'sharp', image: sharpened },
    };
  }

  async vendorStrip(prepared: PreparedImage): Promise<ImageVariant> {
    const height = Math.max(1, Math.floor(prepared.height * ImagePreprocessor.TOP_STRIP_FRACTION));
    const image = await sharp(prepared.image)
      .extract({ left: 0, top: 0, width: prepared.width, height })
      .grayscale()
      .normalize()
      .clahe({ width: this.claheTile(prepared.width), height: this.claheTile(height), maxSlope: 3 })
      .blur(0.6)
      .png()
      .toBuffer();
    return { name: 'top32', image };
  }

  private rightStripBox(prepared: PreparedImage): { left: number; top: number; width: number; height: number } {
    const left = Math.max(0, Math.floor(prepared.width * (1 - ImagePreprocessor.RIGHT_STRIP_FRACTION)));
    return { left, top: 0, width: Math.max(1, prepared.width - left), height: prepared.height };
  }

  async rightStripMixed(prepared: PreparedImage): Promise<ImageVariant> {
    const box = this.rightStripBox(prepared);
    const image = await sharp(prepared.image)
      .extract(box)
      .grayscale()
      .normalize()
      .clahe({ width: this.claheTile(box.width), height: this.claheTile(box.height), maxSlope: 3 })
      .median(3)
      .sharpen({ sigma: 1 })
      .png()
      .toBuffer();
    return { name: 'right42', image };
  }

  async rightStripDigits(prepared: PreparedImage): Promise<ImageVariant> {
    const box = this.rightStripBox(prepared);
    const image = await sharp(prepared.image)
      .extract(box)
      .grayscale()
      .normalize()
      .clahe({ width: this.claheTile(box.width), height: this.claheTile(box.height), maxSlope: 3 })
      .sharpen({ sigma: 1 })
      .png()
      .toBuffer();
    return { name: 'right42', image };
  }

  // Softer rendering of the denoised page for faded vendor lettering
  async softText(denoise: ImageVariant): Promise<ImageVariant> {
    const image = await sharp(denoise.image).blur(1).normalize().png().toBuffer();
    return { name: 'blur', image };
  }
}
