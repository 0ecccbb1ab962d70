/**
 * ImageOptimizer: sharp-based downscaling of frames sent to the model.
 *
 * Frames wider than maxWidth are scaled down (aspect ratio preserved) and
 * re-encoded as JPEG to keep the vision request small.
 */

import sharp from 'sharp';
import { createLogger } from '../utils/Logger.js';

const log = createLogger('ImageOptimizer');

export interface OptimizeOptions {
  /** Maximum width in pixels. Default: 1568 (the API's recommended long edge). */
  maxWidth?: number;
  /** JPEG quality (1-100). Default: 80. */
  quality?: number;
}

export interface OptimizedImage {
  data: Buffer;
  mediaType: 'image/jpeg';
  width: number;
  height: number;
}

const DEFAULT_MAX_WIDTH = 1568;
const DEFAULT_QUALITY = 80;

export async function optimizeForModel(image: Buffer, options: OptimizeOptions = {}): Promise<OptimizedImage> {
  const maxWidth = options.maxWidth ?? DEFAULT_MAX_WIDTH;
  const quality = options.quality ?? DEFAULT_QUALITY;

  const metadata = await sharp(image).metadata();
  const originalWidth = metadata.width ?? 0;
  const originalHeight = metadata.height ?? 0;

  let pipeline = sharp(image);

  if (originalWidth > maxWidth) {
    pipeline = pipeline.resize({ width: maxWidth, withoutEnlargement: true });
    log.debug(`Resizing frame: ${originalWidth}x${originalHeight} → max width ${maxWidth}px`);
  }

  const { data, info } = await pipeline.jpeg({ quality }).toBuffer({ resolveWithObject: true });
  return { data, mediaType: 'image/jpeg', width: info.width, height: info.height };
}
