import type { NormalizedPoint, NormalizedRect, PixelPoint, PixelRect, Size } from '../types/geometry';

/**
 * Scales a normalized rect into pixel space. The origin stays at the
 * lower-left corner; use `flipRect` for top-left surfaces.
 */
export function imageRectForNormalizedRect(rect: NormalizedRect, imageWidth: number, imageHeight: number): PixelRect {
  return {
    x: rect.x * imageWidth,
    y: rect.y * imageHeight,
    width: rect.width * imageWidth,
    height: rect.height * imageHeight,
  };
}

export function imagePointForNormalizedPoint(point: NormalizedPoint, imageWidth: number, imageHeight: number): PixelPoint {
  return { x: point.x * imageWidth, y: point.y * imageHeight };
}

export function flipRect(rect: PixelRect, surfaceHeight: number): PixelRect {
  return { ...rect, y: surfaceHeight - rect.y - rect.height };
}

export function flipPoint(point: PixelPoint, surfaceHeight: number): PixelPoint {
  return { x: point.x, y: surfaceHeight - point.y };
}

/** Maps points normalized to `boundingBox` (e.g. face landmarks) into pixel space. */
export function pointsInImage(points: NormalizedPoint[], boundingBox: NormalizedRect, size: Size): PixelPoint[] {
  return points.map(p =>
    imagePointForNormalizedPoint(
      { x: boundingBox.x + p.x * boundingBox.width, y: boundingBox.y + p.y * boundingBox.height },
      size.width,
      size.height,
    ),
  );
}

/**
 * Integer top-left crop rectangle for a region of interest, clamped to the
 * image and at least one pixel wide and tall.
 */
export function cropRectForRegion(region: NormalizedRect, size: Size): PixelRect {
  const rect = flipRect(imageRectForNormalizedRect(region, size.width, size.height), size.height);
  const x = clamp(Math.round(rect.x), 0, size.width - 1);
  const y = clamp(Math.round(rect.y), 0, size.height - 1);
  return {
    x,
    y,
    width: clamp(Math.round(rect.width), 1, size.width - x),
    height: clamp(Math.round(rect.height), 1, size.height - y),
  };
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
