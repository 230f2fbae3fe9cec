/** `[x, y, width, height, score, classIndex]`, top-left origin. */
export type ScoredBox = [number, number, number, number, number, number];

/**
 * Calculate IoU (Intersection over Union) between two bounding boxes
 */
export function iou(box1: [number, number, number, number], box2: [number, number, number, number]): number {
  const [x1, y1, w1, h1] = box1;
  const [x2, y2, w2, h2] = box2;

  const xi1 = Math.max(x1, x2);
  const yi1 = Math.max(y1, y2);
  const xi2 = Math.min(x1 + w1, x2 + w2);
  const yi2 = Math.min(y1 + h1, y2 + h2);
  const interArea = Math.max(0, xi2 - xi1) * Math.max(0, yi2 - yi1);

  const unionArea = w1 * h1 + w2 * h2 - interArea;
  return unionArea > 0 ? interArea / unionArea : 0;
}

/**
 * Gaussian soft-NMS. Boxes overlapping a kept box by more than
 * `iouThreshold` have their score decayed; a decayed box falling to
 * `scoreThreshold` or below is dropped. Boxes that were never decayed are
 * kept whatever their score. Kept boxes retain their original score.
 */
export function softNMS(
  boxes: ScoredBox[],
  iouThreshold: number,
  sigma = 0.5,
  scoreThreshold = 0.3,
): ScoredBox[] {
  if (boxes.length === 0) return [];

  const scores = boxes.map(box => box[4]);
  const byScore = (a: number, b: number) => scores[b] - scores[a];
  let indices = boxes.map((_, i) => i).sort(byScore);
  const keepBoxes: ScoredBox[] = [];
  const decayed = new Set<number>();

  while (indices.length > 0) {
    const [currentIdx, ...rest] = indices;
    const current = boxes[currentIdx];
    keepBoxes.push(current);

    for (const idx of rest) {
      const box = boxes[idx];
      const overlap = iou([current[0], current[1], current[2], current[3]], [box[0], box[1], box[2], box[3]]);
      if (overlap > iouThreshold) {
        scores[idx] *= Math.exp(-(overlap * overlap) / sigma);
        decayed.add(idx);
      }
    }

    indices = rest.filter(idx => !decayed.has(idx) || scores[idx] > scoreThreshold).sort(byScore);
  }

  return keepBoxes;
}
