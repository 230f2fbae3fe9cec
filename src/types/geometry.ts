/**
 * Normalized coordinates live in the unit square with the origin at the
 * lower-left corner of the image.
 */
export interface NormalizedRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface NormalizedPoint {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

/** Pixel-space rectangle, origin at the top-left unless flipped. */
export interface PixelRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface PixelPoint {
  x: number;
  y: number;
}

export const FULL_IMAGE: Readonly<NormalizedRect> = Object.freeze({
  x: 0,
  y: 0,
  width: 1,
  height: 1,
});

export function isFullImage(rect: NormalizedRect): boolean {
  return rect.x === 0 && rect.y === 0 && rect.width === 1 && rect.height === 1;
}
