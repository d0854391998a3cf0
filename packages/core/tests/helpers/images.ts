import sharp from 'sharp';

/**
 * A solid-color image of the given pixel size
 */
export function solidImage(width: number, height: number, format: 'png' | 'jpeg' | 'webp' = 'png'): Promise<Buffer> {
  const image = sharp({
    create: { width, height, channels: 3, background: { r: 40, g: 90, b: 160 } },
  });
  return image.toFormat(format).toBuffer();
}

export async function solidImageBase64(width: number, height: number, format: 'png' | 'jpeg' | 'webp' = 'png'): Promise<string> {
  return (await solidImage(width, height, format)).toString('base64');
}
