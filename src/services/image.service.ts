import sharp from 'sharp';
import { errorMessage, InvalidImageError } from '../errors/PipelineErrors';
import { SourceImage } from '../types/PrescriptionTypes';
import { createLogger, Logger } from '../utils/logger';

export interface ImagePolicy {
  /** Smallest accepted width and height, in pixels. */
  minDimension: number;
  /** Longer edges are scaled down to this. */
  maxDimension: number;
  jpegQuality: number;
}

export const DEFAULT_IMAGE_POLICY: ImagePolicy = {
  minDimension: 100,
  maxDimension: 2048,
  jpegQuality: 85,
};

const SUPPORTED_FORMATS: ReadonlySet<string> = new Set(['png', 'jpeg', 'webp']);

export interface ImagePreparer {
  prepare(image: SourceImage): Promise<SourceImage>;
}

/**
 * Checks an upload by decoding it, then re-encodes it as an RGB JPEG no
 * larger than the policy allows. Rejections throw `InvalidImageError`.
 */
export class ImageService implements ImagePreparer {
  private readonly logger: Logger;

  constructor(
    private readonly policy: ImagePolicy = DEFAULT_IMAGE_POLICY,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('image-service');
  }

  async prepare(image: SourceImage): Promise<SourceImage> {
    let metadata: sharp.Metadata;
    try {
      metadata = await sharp(image.data).metadata();
    } catch (error) {
      throw new InvalidImageError(`Image could not be decoded: ${errorMessage(error)}`);
    }

    const { format, width, height } = metadata;
    if (!format || !SUPPORTED_FORMATS.has(format)) {
      throw new InvalidImageError(
        `Unsupported image format${format ? ` (${format})` : ''}. Supported formats: ${[...SUPPORTED_FORMATS].join(', ')}.`
      );
    }
    if (!width || !height) {
      throw new InvalidImageError('Image could not be decoded: missing dimensions.');
    }

    const { minDimension, maxDimension, jpegQuality } = this.policy;
    if (width < minDimension || height < minDimension) {
      throw new InvalidImageError(
        `Image dimensions too small (${width}x${height}). Minimum size: ${minDimension}x${minDimension} pixels.`
      );
    }

    try {
      const data = await sharp(image.data)
        .rotate()
        .resize(maxDimension, maxDimension, { fit: 'inside', withoutEnlargement: true })
        .flatten({ background: '#ffffff' })
        .toColourspace('srgb')
        .jpeg({ quality: jpegQuality })
        .toBuffer();
      return { ...image, data, mimeType: 'image/jpeg' };
    } catch (error) {
      this.logger.warn('Image optimization failed, using the original upload', {
        format,
        width,
        height,
        error: errorMessage(error),
      });
      return image;
    }
  }
}
