/**
 * Turns the request's base64 image map into embeddable media, one outcome
 * per token. A bad image yields an ImageDecodeError for its own token and
 * leaves the others untouched.
 */

import sharp from 'sharp';

import { CONTENT_BOX, DEFAULT_IMAGE_WIDTH, IMAGE_WIDTHS } from '../constants.js';
import type { ContentBox, PreparedImage } from '../types/index.js';
import { ImageDecodeError } from '../utils/errors.js';
import { fitMeasured, measureImage } from './BoxFitScaler.js';

const DATA_URL_PREFIX = /^data:[\w.+-]+\/[\w.+-]+(;[\w=.+-]+)*;base64,/i;
const BASE64_BODY = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Formats Word renders natively, with their media extension and MIME type.
 * Anything else sharp can read is converted to PNG.
 */
const EMBEDDABLE: Readonly<Record<string, { extension: string; contentType: string }>> = {
  png: { extension: 'png', contentType: 'image/png' },
  jpeg: { extension: 'jpeg', contentType: 'image/jpeg' },
  gif: { extension: 'gif', contentType: 'image/gif' },
  tiff: { extension: 'tiff', contentType: 'image/tiff' },
};

export interface ImagePreparerOptions {
  imageWidths?: Readonly<Record<string, number>>;
  defaultImageWidth?: number;
  contentBox?: ContentBox;
}

/**
 * Strict base64 decoding; an optional data: URL prefix and embedded
 * whitespace are accepted
 */
export function decodeBase64Image(token: string, value: string): Buffer {
  const body = value.trim().replace(DATA_URL_PREFIX, '').replace(/\s+/g, '');
  if (body === '') {
    throw new ImageDecodeError(token, 'image data is empty');
  }
  if (body.length % 4 !== 0 || !BASE64_BODY.test(body)) {
    throw new ImageDecodeError(token, 'malformed base64');
  }
  return Buffer.from(body, 'base64');
}

export function preferredWidthFor(token: string, options: ImagePreparerOptions = {}): number {
  const widths = options.imageWidths ?? IMAGE_WIDTHS;
  return widths[token] ?? options.defaultImageWidth ?? DEFAULT_IMAGE_WIDTH;
}

/**
 * Decode, identify and size one image
 */
export async function prepareImage(token: string, value: string, options: ImagePreparerOptions = {}): Promise<PreparedImage> {
  const decoded = decodeBase64Image(token, value);

  const measurement = await measureImage(decoded);
  if (!measurement.ok) {
    throw new ImageDecodeError(token, measurement.reason);
  }

  const size = fitMeasured(measurement, preferredWidthFor(token, options), options.contentBox ?? CONTENT_BOX);

  const native = EMBEDDABLE[measurement.format];
  if (native) {
    return { token, data: decoded, ...native, size };
  }

  try {
    const data = await sharp(decoded).png().toBuffer();
    return { token, data, ...EMBEDDABLE.png, size };
  } catch (error) {
    throw new ImageDecodeError(token, `cannot convert ${measurement.format} to png`, error);
  }
}

/**
 * Prepare every image of a request concurrently
 */
export async function prepareImages(
  images: Readonly<Record<string, string>>,
  options: ImagePreparerOptions = {},
): Promise<Map<string, PreparedImage | ImageDecodeError>> {
  const entries = await Promise.all(
    Object.entries(images).map(async ([token, value]): Promise<[string, PreparedImage | ImageDecodeError]> => {
      try {
        return [token, await prepareImage(token, value, options)];
      } catch (error) {
        if (error instanceof ImageDecodeError) {
          return [token, error];
        }
        return [token, new ImageDecodeError(token, error instanceof Error ? error.message : String(error), error)];
      }
    }),
  );
  return new Map(entries);
}
