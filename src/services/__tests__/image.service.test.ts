import sharp from 'sharp';
import { describe, expect, it } from 'vitest';
import { InvalidImageError } from '../../errors/PipelineErrors';
import { silentLogger } from '../../__tests__/support/fakes';
import { DEFAULT_IMAGE_POLICY, ImageService } from '../image.service';

const blank = (width: number, height: number) =>
  sharp({ create: { width, height, channels: 4, background: { r: 200, g: 10, b: 10, alpha: 0.5 } } });

const upload = (data: Buffer, mimeType = 'image/png') => ({ data, mimeType, originalName: 'rx-scan.png' });

const service = new ImageService(DEFAULT_IMAGE_POLICY, silentLogger);

describe('ImageService', () => {
  it('downscales an oversized image into an RGB JPEG', async () => {
    const prepared = await service.prepare(upload(await blank(3000, 1500).png().toBuffer()));

    const metadata = await sharp(prepared.data).metadata();
    expect([metadata.format, metadata.width, metadata.height, metadata.channels]).toEqual(['jpeg', 2048, 1024, 3]);
    expect(prepared.mimeType).toBe('image/jpeg');
    expect(prepared.originalName).toBe('rx-scan.png');
  });

  it('keeps the size of an image within bounds', async () => {
    const prepared = await service.prepare(upload(await blank(400, 300).webp().toBuffer(), 'image/webp'));

    const metadata = await sharp(prepared.data).metadata();
    expect([metadata.format, metadata.width, metadata.height]).toEqual(['jpeg', 400, 300]);
  });

  it('rejects an image below the minimum size', async () => {
    const prepare = service.prepare(upload(await blank(80, 200).png().toBuffer()));

    await expect(prepare).rejects.toThrow(
      new InvalidImageError('Image dimensions too small (80x200). Minimum size: 100x100 pixels.')
    );
  });

  it('rejects bytes that are not an image', async () => {
    const prepare = service.prepare(upload(Buffer.from('not-really-a-png')));

    await expect(prepare).rejects.toBeInstanceOf(InvalidImageError);
    await expect(prepare).rejects.toThrow(/^Image could not be decoded: /);
  });

  it('rejects a decodable image in an unsupported format', async () => {
    const prepare = service.prepare(upload(await blank(200, 200).tiff().toBuffer(), 'image/png'));

    await expect(prepare).rejects.toThrow('Unsupported image format (tiff). Supported formats: png, jpeg, webp.');
  });
});
