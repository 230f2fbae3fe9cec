import type { DecodedImage, ImageContext } from '../../engine/image-context';

/**
 * Converts interleaved 8-bit pixels into a float tensor scaled to [0, 1].
 */
export function pixelsToTensor(
  pixels: Uint8Array,
  width: number,
  height: number,
  channels: number,
  inputShape: 'NCHW' | 'NHWC' = 'NCHW',
): Float32Array {
  const pixelCount = width * height;
  const data = new Float32Array(channels * pixelCount);

  for (let i = 0; i < pixelCount; i++) {
    for (let c = 0; c < channels; c++) {
      const srcIdx = i * channels + c;
      // NHWC keeps the interleaved layout; NCHW groups each channel into a plane
      const dstIdx = inputShape === 'NHWC' ? srcIdx : c * pixelCount + i;
      data[dstIdx] = pixels[srcIdx] / 255.0;
    }
  }

  return data;
}

/**
 * Resizes a decoded image to the model input (stretching, no letterbox) and
 * returns it as a float tensor.
 */
export async function imageToTensor(
  image: DecodedImage,
  context: ImageContext,
  targetSize: [number, number],
  inputShape: 'NCHW' | 'NHWC' = 'NCHW',
): Promise<Float32Array> {
  const [targetWidth, targetHeight] = targetSize;
  const { data, info } = await context
    .pipeline(image)
    .resize(targetWidth, targetHeight, { fit: 'fill', kernel: 'lanczos3' })
    .removeAlpha()
    .toColourspace('srgb')
    .raw()
    .toBuffer({ resolveWithObject: true });

  return pixelsToTensor(data, info.width, info.height, info.channels, inputShape);
}
