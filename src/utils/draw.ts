import sharp from 'sharp'
import { Buffer } from 'node:buffer'
import type { ImageInput } from '../types'
import type { NormalizedPoint, PixelPoint, Size } from '../types/geometry'
import {
  ContoursObservation,
  DetectedObjectObservation,
  FaceObservation,
  HorizonObservation,
  HumanBodyPoseObservation,
  PixelBufferObservation,
  RectangleObservation,
  SaliencyImageObservation,
  type Contour,
  type FaceLandmarkName,
  type LandmarkRegion,
  type Observation,
  type PixelMask,
  type RecognizedPoint,
} from '../types/observations'
import { flipPoint, flipRect, imagePointForNormalizedPoint, imageRectForNormalizedRect, pointsInImage } from './geometry'

export interface DrawOptions {
  /** Draw for a top-left origin surface, as image files are. Defaults to true. */
  flipped?: boolean
  /** One color for everything; otherwise each observation gets a palette color. */
  color?: string
  /** Face landmark regions to draw, all when omitted. */
  landmarks?: FaceLandmarkName[]
  /** Adds a confidence label above bounding boxes. */
  showConfidence?: boolean
  /** Body pose joints below this confidence are skipped. */
  minimumPointConfidence?: number
  /** Tint for segmentation and saliency masks. */
  maskColor?: { r: number; g: number; b: number }
  /** Alpha of a fully set mask pixel, 0 to 1. Defaults to 0.5. */
  maskOpacity?: number
}

const DEFAULT_MASK_COLOR = { r: 255, g: 0, b: 128 }

/**
 * Composites the observations onto the image and writes it to `outputPath`.
 */
export async function drawObservations(
  image: ImageInput,
  observations: Observation[],
  outputPath: string,
  options: DrawOptions = {}
): Promise<void> {
  const { pipeline, layers } = await overlay(image, observations, options)
  await pipeline.composite(layers).toFile(outputPath)
}

/** Same as `drawObservations`, returning PNG bytes. */
export async function renderObservations(
  image: ImageInput,
  observations: Observation[],
  options: DrawOptions = {}
): Promise<Buffer> {
  const { pipeline, layers } = await overlay(image, observations, options)
  return pipeline.composite(layers).png().toBuffer()
}

async function overlay(image: ImageInput, observations: Observation[], options: DrawOptions) {
  const pipeline = sharp(image).rotate()
  const { width = 0, height = 0, orientation } = await sharp(image).metadata()
  // orientations 5-8 swap the axes once rotated
  const size = orientation !== undefined && orientation >= 5 ? { width: height, height: width } : { width, height }
  const masks = await Promise.all(
    observations
      .filter((observation): observation is PixelBufferObservation => observation instanceof PixelBufferObservation)
      .map(observation => renderMask(observation.mask, size, options))
  )
  const svg = Buffer.from(buildOverlaySvg(observations, size, options))
  const layers = [...masks, svg].map((input): sharp.OverlayOptions => ({ input, blend: 'over' }))
  return { pipeline, layers }
}

/**
 * Encodes a mask as a tinted, semi-transparent PNG stretched to `size`.
 * Float masks are read as 0 to 1, byte masks as 0 to 255.
 */
export async function renderMask(mask: PixelMask, size: Size, options: DrawOptions = {}): Promise<Buffer> {
  const { r, g, b } = options.maskColor ?? DEFAULT_MASK_COLOR
  const opacity = options.maskOpacity ?? 0.5
  const scale = mask.data instanceof Float32Array ? 255 : 1
  const pixelCount = mask.width * mask.height
  const rgba = Buffer.alloc(pixelCount * 4)

  for (let i = 0; i < pixelCount; i++) {
    const value = Math.min(Math.max(mask.data[i] * scale, 0), 255)
    rgba[i * 4] = r
    rgba[i * 4 + 1] = g
    rgba[i * 4 + 2] = b
    rgba[i * 4 + 3] = Math.round(value * opacity)
  }

  // mask rows run top to bottom, as image files do
  let pipeline = sharp(rgba, { raw: { width: mask.width, height: mask.height, channels: 4 } })
  if (options.flipped === false) pipeline = pipeline.flip()
  if (mask.width !== size.width || mask.height !== size.height) {
    pipeline = pipeline.resize(size.width, size.height, { fit: 'fill', kernel: 'nearest' })
  }
  return pipeline.png().toBuffer()
}

/**
 * Builds the SVG overlay for a surface of `size` pixels.
 */
export function buildOverlaySvg(observations: Observation[], size: Size, options: DrawOptions = {}): string {
  const palette = generateColorPalette(Math.max(observations.length, 1))
  const shapes = observations
    .map((observation, index) => drawObservation(observation, size, options, options.color ?? palette[index]))
    .filter(shape => shape.length > 0)
    .join('\n')

  return `<svg width="${size.width}" height="${size.height}" xmlns="http://www.w3.org/2000/svg">
  <defs>
    <style>
      .bounding-box, .quad, .landmark-path, .contour, .horizon { fill: none; stroke-width: 2.5; stroke-linejoin: round; }
      .label-background { fill-opacity: 0.9; }
      .label-text { fill: white; font-size: 13px; font-family: Arial, sans-serif; font-weight: bold; }
    </style>
  </defs>
${shapes}
</svg>`
}

function drawObservation(observation: Observation, size: Size, options: DrawOptions, color: string): string {
  const flipped = options.flipped ?? true
  const toSurface = (point: PixelPoint): PixelPoint => (flipped ? flipPoint(point, size.height) : point)
  const normalizedToSurface = (point: NormalizedPoint) =>
    toSurface(imagePointForNormalizedPoint(point, size.width, size.height))

  if (observation instanceof RectangleObservation) {
    const corners = [observation.topLeft, observation.topRight, observation.bottomRight, observation.bottomLeft]
    return `<polygon points="${pointList(corners.map(normalizedToSurface))}" class="quad" stroke="${color}" />`
  }

  if (observation instanceof DetectedObjectObservation) {
    const pixels = imageRectForNormalizedRect(observation.boundingBox, size.width, size.height)
    const rect = flipped ? flipRect(pixels, size.height) : pixels
    const parts = [
      `<rect x="${fmt(rect.x)}" y="${fmt(rect.y)}" width="${fmt(rect.width)}" height="${fmt(rect.height)}" rx="4" ry="4" class="bounding-box" stroke="${color}" />`,
    ]
    if (options.showConfidence) {
      const label = `${(observation.confidence * 100).toFixed(0)}%`
      const labelWidth = label.length * 7.5 + 16
      const labelX = Math.min(rect.x, size.width - labelWidth)
      const labelY = Math.max(rect.y - 30, 10)
      parts.push(
        `<rect x="${fmt(labelX)}" y="${fmt(labelY)}" width="${fmt(labelWidth)}" height="24" rx="12" ry="12" class="label-background" fill="${color}" />`,
        `<text x="${fmt(labelX + 8)}" y="${fmt(labelY + 17)}" class="label-text">${label}</text>`
      )
    }
    if (observation instanceof FaceObservation && observation.landmarks) {
      for (const [name, region] of Object.entries(observation.landmarks)) {
        if (!region || (options.landmarks && !options.landmarks.some(enabled => enabled === name))) continue
        parts.push(drawLandmarkRegion(region, pointsInImage(region.points, observation.boundingBox, size).map(toSurface), color))
      }
    }
    return parts.join('\n')
  }

  if (observation instanceof ContoursObservation) {
    return drawContours(observation.contours, normalizedToSurface, color).join('\n')
  }

  if (observation instanceof HumanBodyPoseObservation) {
    const minimum = options.minimumPointConfidence ?? 0.1
    return Object.values(observation.recognizedPoints)
      .filter((point): point is RecognizedPoint => point !== undefined && point.confidence >= minimum)
      .map(point => {
        const { x, y } = normalizedToSurface(point)
        return `<circle cx="${fmt(x)}" cy="${fmt(y)}" r="4" class="joint" fill="${color}" />`
      })
      .join('\n')
  }

  if (observation instanceof SaliencyImageObservation) {
    return observation.salientObjects.map(salient => drawObservation(salient, size, options, color)).join('\n')
  }

  if (observation instanceof HorizonObservation) {
    const reach = Math.max(size.width, size.height)
    const center = { x: size.width / 2, y: size.height / 2 }
    const dx = Math.cos(observation.angle) * reach
    const dy = Math.sin(observation.angle) * reach
    const [start, end] = [
      toSurface({ x: center.x - dx, y: center.y - dy }),
      toSurface({ x: center.x + dx, y: center.y + dy }),
    ]
    return `<line x1="${fmt(start.x)}" y1="${fmt(start.y)}" x2="${fmt(end.x)}" y2="${fmt(end.y)}" class="horizon" stroke="${color}" />`
  }

  return ''
}

function drawLandmarkRegion(region: LandmarkRegion, points: PixelPoint[], color: string): string {
  switch (region.pointsClassification) {
    case 'disconnected':
      return points
        .map(({ x, y }) => `<circle cx="${fmt(x)}" cy="${fmt(y)}" r="2" class="landmark-point" fill="${color}" />`)
        .join('\n')
    case 'openPath':
      return `<polyline points="${pointList(points)}" class="landmark-path" stroke="${color}" />`
    case 'closedPath':
      return `<polygon points="${pointList(points)}" class="landmark-path" stroke="${color}" />`
  }
}

function drawContours(contours: Contour[], toSurface: (point: NormalizedPoint) => PixelPoint, color: string): string[] {
  return contours.flatMap(contour => [
    `<polygon points="${pointList(contour.points.map(toSurface))}" class="contour" stroke="${color}" />`,
    ...drawContours(contour.children, toSurface, color),
  ])
}

function pointList(points: PixelPoint[]): string {
  return points.map(({ x, y }) => `${fmt(x)},${fmt(y)}`).join(' ')
}

function fmt(value: number): number {
  return Number(value.toFixed(2))
}

/** Spreads hues by the golden angle so neighbours stay distinguishable. */
export function generateColorPalette(count: number): string[] {
  const palette: string[] = []
  for (let i = 0; i < count; i++) {
    const hue = (i * 137.508) % 360
    palette.push(`hsl(${fmt(hue)}, 80%, 55%)`)
  }
  return palette
}
