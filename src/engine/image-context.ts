import sharp from 'sharp';
import { ImageDecodeError } from '../errors';
import type { ImageInput } from '../types';
import { isFullImage, type NormalizedRect } from '../types/geometry';
import { cropRectForRegion } from '../utils/geometry';

/** Raw interleaved pixels, first row at the top. */
export interface DecodedImage {
  width: number;
  height: number;
  channels: 1 | 2 | 3 | 4;
  data: Buffer;
}

export interface ImageContextOptions {
  name?: string;
  /** sharp's decode strictness. */
  failOn?: 'none' | 'truncated' | 'error' | 'warning';
  limitInputPixels?: number | boolean;
}

/**
 * Decodes and samples images for the engine. sharp pipelines are created per
 * call, so one context can serve concurrent batches.
 */
export class ImageContext {
  readonly name: string;
  private readonly failOn: NonNullable<ImageContextOptions['failOn']>;
  private readonly limitInputPixels: number | boolean;

  constructor(options: ImageContextOptions = {}) {
    this.name = options.name ?? 'ImageContext';
    this.failOn = options.failOn ?? 'warning';
    this.limitInputPixels = options.limitInputPixels ?? true;
  }

  /** Decodes to sRGB without alpha, applying EXIF orientation. */
  async decode(input: ImageInput): Promise<DecodedImage> {
    try {
      const { data, info } = await sharp(input, { failOn: this.failOn, limitInputPixels: this.limitInputPixels })
        .rotate()
        .removeAlpha()
        .toColourspace('srgb')
        .raw()
        .toBuffer({ resolveWithObject: true });
      return { width: info.width, height: info.height, channels: info.channels, data };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ImageDecodeError(`Failed to decode image: ${reason}`, { cause: error });
    }
  }

  async crop(image: DecodedImage, region: NormalizedRect): Promise<DecodedImage> {
    if (isFullImage(region)) return image;

    const rect = cropRectForRegion(region, image);
    const { data, info } = await this.pipeline(image)
      .extract({ left: rect.x, top: rect.y, width: rect.width, height: rect.height })
      .raw()
      .toBuffer({ resolveWithObject: true });
    return { width: info.width, height: info.height, channels: info.channels, data };
  }

  /** A sharp pipeline reading the decoded pixels. */
  pipeline(image: DecodedImage): sharp.Sharp {
    return sharp(image.data, {
      raw: { width: image.width, height: image.height, channels: image.channels },
    });
  }
}

export const sharedImageContext = new ImageContext({ name: 'SharedImageContext' });
