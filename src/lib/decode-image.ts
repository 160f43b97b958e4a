import sharp from 'sharp';

import { ImageDecodeError } from './errors';
import type { RawImage } from './type';

/** Largest accepted width x height (about 5000 x 5000); sharp refuses bigger inputs. */
export const MAX_INPUT_PIXELS = 25_000_000;

export async function decodeImage(
  buffer: Buffer,
  maxPixels: number = MAX_INPUT_PIXELS,
): Promise<RawImage> {
  if (buffer.length === 0) {
    throw new ImageDecodeError('Uploaded file is empty');
  }

  try {
    // grayscale and alpha images both come out as 3 channel RGB
    const { data, info } = await sharp(buffer, { limitInputPixels: maxPixels })
      .rotate()
      .toColourspace('srgb')
      .removeAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });

    if (info.channels !== 3) {
      throw new ImageDecodeError(`Expected 3 colour channels, got ${info.channels}`);
    }

    return { data, width: info.width, height: info.height };
  } catch (error) {
    if (error instanceof ImageDecodeError) throw error;
    throw new ImageDecodeError(undefined, { cause: error });
  }
}
