import sharp from 'sharp';
import { describe, expect, it } from 'vitest';

import { decodeImage } from './decode-image';
import { ImageDecodeError } from './errors';

describe('decodeImage', () => {
  it('decodes a JPEG into RGB pixels', async () => {
    const jpeg = await sharp({
      create: { width: 64, height: 32, channels: 3, background: { r: 200, g: 10, b: 10 } },
    })
      .jpeg()
      .toBuffer();

    const image = await decodeImage(jpeg);

    expect(image.width).toBe(64);
    expect(image.height).toBe(32);
    expect(image.data.length).toBe(64 * 32 * 3);
  });

  it('drops the alpha channel of a PNG', async () => {
    const png = await sharp({
      create: { width: 8, height: 8, channels: 4, background: { r: 0, g: 0, b: 255, alpha: 0.5 } },
    })
      .png()
      .toBuffer();

    const image = await decodeImage(png);

    expect(image.data.length).toBe(8 * 8 * 3);
  });

  it('rejects bytes that are not an image', async () => {
    await expect(decodeImage(Buffer.from('definitely not an image'))).rejects.toBeInstanceOf(
      ImageDecodeError,
    );
  });

  it('rejects images above the pixel limit', async () => {
    const jpeg = await sharp({
      create: { width: 64, height: 32, channels: 3, background: { r: 0, g: 0, b: 0 } },
    })
      .jpeg()
      .toBuffer();

    await expect(decodeImage(jpeg, 64 * 32 - 1)).rejects.toBeInstanceOf(ImageDecodeError);
    await expect(decodeImage(jpeg, 64 * 32)).resolves.toMatchObject({ width: 64, height: 32 });
  });

  it('rejects an empty upload', async () => {
    await expect(decodeImage(Buffer.alloc(0))).rejects.toThrow('Uploaded file is empty');
  });
});
