/**
 * Box-Fit Scaler
 *
 * Sizes an image to a preferred width while keeping its aspect ratio and
 * staying inside the page content box. A size is always produced: when the
 * intrinsic dimensions cannot be read the result is the documented
 * fallback variant instead of an error.
 */

import sharp from 'sharp';

import { CONTENT_BOX, FALLBACK_IMAGE_HEIGHT } from '../constants.js';
import type { BoxFitResult, ContentBox, ImageDimensions, ImageMeasurement } from '../types/index.js';

/**
 * Fallback size: the clamped preferred width and a fixed 4" height
 */
export function fallbackSize(preferredWidth: number, box: ContentBox, reason: string): BoxFitResult {
  return {
    kind: 'fallback',
    width: Math.min(preferredWidth, box.maxWidth),
    height: Math.min(FALLBACK_IMAGE_HEIGHT, box.maxHeight),
    reason,
  };
}

/**
 * Width first, then height, then width again
 */
export function fitToBox(
  dimensions: ImageDimensions,
  preferredWidth: number,
  box: ContentBox = CONTENT_BOX,
): BoxFitResult {
  const { width: intrinsicWidth, height: intrinsicHeight } = dimensions;
  if (!(intrinsicWidth > 0) || !(intrinsicHeight > 0) || !Number.isFinite(intrinsicWidth) || !Number.isFinite(intrinsicHeight)) {
    return fallbackSize(preferredWidth, box, `invalid intrinsic size ${intrinsicWidth}x${intrinsicHeight}`);
  }

  const aspect = intrinsicWidth / intrinsicHeight;
  let width = Math.min(preferredWidth, box.maxWidth);
  let height = width / aspect;

  if (height > box.maxHeight) {
    height = box.maxHeight;
    width = height * aspect;
    if (width > box.maxWidth) {
      width = box.maxWidth;
      height = width / aspect;
    }
  }

  return { kind: 'fitted', width, height };
}

/**
 * Read format and intrinsic pixel size. Dimensions are reported as
 * displayed, so EXIF orientations that rotate by 90° swap them.
 */
export async function measureImage(bytes: Buffer): Promise<ImageMeasurement> {
  try {
    const metadata = await sharp(bytes).metadata();
    if (!metadata.format) {
      return { ok: false, reason: 'unrecognized image format' };
    }
    if (metadata.width === undefined || metadata.height === undefined) {
      return { ok: true, format: metadata.format };
    }

    const rotated = (metadata.orientation ?? 1) >= 5;
    return {
      ok: true,
      format: metadata.format,
      dimensions: rotated
        ? { width: metadata.height, height: metadata.width }
        : { width: metadata.width, height: metadata.height },
    };
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Size from an existing measurement
 */
export function fitMeasured(measurement: ImageMeasurement, preferredWidth: number, box: ContentBox = CONTENT_BOX): BoxFitResult {
  if (!measurement.ok) {
    return fallbackSize(preferredWidth, box, measurement.reason);
  }
  if (!measurement.dimensions) {
    return fallbackSize(preferredWidth, box, `no dimensions in ${measurement.format} metadata`);
  }
  return fitToBox(measurement.dimensions, preferredWidth, box);
}

/**
 * Size raw image bytes. Never rejects.
 */
export async function scaleImage(bytes: Buffer, preferredWidth: number, box: ContentBox = CONTENT_BOX): Promise<BoxFitResult> {
  return fitMeasured(await measureImage(bytes), preferredWidth, box);
}
