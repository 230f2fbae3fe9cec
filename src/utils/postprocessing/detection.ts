import type { NormalizedRect } from '../../types/geometry';
import { softNMS, type ScoredBox } from '../utils';

export interface NormalizedDetection {
  boundingBox: NormalizedRect;
  confidence: number;
  classIndex: number;
}

/**
 * Decodes one image's YOLO output laid out as `[4 + classes, predictions]`
 * (center x, center y, width, height, then one score per class) into boxes
 * in model-input pixels.
 */
export function postprocessDetection(
  outputData: Float32Array,
  confThreshold: number,
  iouThreshold: number,
  numPredictions: number,
  channels: number,
  classes?: readonly number[],
): ScoredBox[] {
  const boxes: ScoredBox[] = [];

  for (let i = 0; i < numPredictions; i++) {
    const xCenter = outputData[i];
    const yCenter = outputData[i + numPredictions];
    const width = outputData[i + 2 * numPredictions];
    const height = outputData[i + 3 * numPredictions];

    let maxConfidence = Number.NEGATIVE_INFINITY;
    let classIndex = -1;

    for (let c = 4; c < channels; c++) {
      if (classes && !classes.includes(c - 4)) continue;
      const confidence = outputData[i + c * numPredictions];
      if (confidence > maxConfidence) {
        maxConfidence = confidence;
        classIndex = c - 4;
      }
    }

    if (maxConfidence > confThreshold) {
      boxes.push([xCenter - width / 2, yCenter - height / 2, width, height, maxConfidence, classIndex]);
    }
  }

  return softNMS(boxes, iouThreshold);
}

/**
 * Converts top-left model-input pixel boxes into rects normalized to the
 * image, lower-left origin, clipped to the unit square.
 */
export function normalizeDetections(boxes: ScoredBox[], targetSize: [number, number]): NormalizedDetection[] {
  const [targetWidth, targetHeight] = targetSize;
  return boxes.map(([x, y, w, h, confidence, classIndex]) => {
    const left = clampUnit(x / targetWidth);
    const right = clampUnit((x + w) / targetWidth);
    const top = clampUnit(y / targetHeight);
    const bottom = clampUnit((y + h) / targetHeight);
    return {
      boundingBox: { x: left, y: 1 - bottom, width: right - left, height: bottom - top },
      confidence,
      classIndex,
    };
  });
}

function clampUnit(value: number): number {
  return Math.min(Math.max(value, 0), 1);
}
