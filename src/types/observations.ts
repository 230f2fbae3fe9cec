import { randomUUID } from 'node:crypto';
import type { NormalizedPoint, NormalizedRect } from './geometry';

/** Constructor used as a runtime type tag when narrowing observations. */
export type ObservationType<T extends Observation = Observation> = abstract new (...args: never[]) => T;

export interface ObservationInit {
  confidence?: number;
}

export class Observation {
  readonly uuid: string = randomUUID();
  readonly confidence: number;

  constructor(init: ObservationInit = {}) {
    this.confidence = init.confidence ?? 1;
  }
}

export interface DetectedObjectInit extends ObservationInit {
  boundingBox: NormalizedRect;
}

export class DetectedObjectObservation extends Observation {
  readonly boundingBox: NormalizedRect;

  constructor(init: DetectedObjectInit) {
    super(init);
    this.boundingBox = { ...init.boundingBox };
  }
}

export type PointsClassification = 'disconnected' | 'openPath' | 'closedPath';

/** Points are normalized to the face bounding box. */
export interface LandmarkRegion {
  points: NormalizedPoint[];
  pointsClassification: PointsClassification;
}

export type FaceLandmarkName =
  | 'faceContour'
  | 'leftEye'
  | 'rightEye'
  | 'leftEyebrow'
  | 'rightEyebrow'
  | 'nose'
  | 'noseCrest'
  | 'medianLine'
  | 'outerLips'
  | 'innerLips'
  | 'leftPupil'
  | 'rightPupil';

export type FaceLandmarks = Partial<Record<FaceLandmarkName, LandmarkRegion>>;

export interface FaceInit extends DetectedObjectInit {
  landmarks?: FaceLandmarks;
  captureQuality?: number;
  roll?: number;
  yaw?: number;
}

export class FaceObservation extends DetectedObjectObservation {
  readonly landmarks?: FaceLandmarks;
  readonly captureQuality?: number;
  readonly roll?: number;
  readonly yaw?: number;

  constructor(init: FaceInit) {
    super(init);
    this.landmarks = init.landmarks;
    this.captureQuality = init.captureQuality;
    this.roll = init.roll;
    this.yaw = init.yaw;
  }
}

export interface HumanInit extends DetectedObjectInit {
  upperBodyOnly?: boolean;
}

export class HumanObservation extends DetectedObjectObservation {
  readonly upperBodyOnly: boolean;

  constructor(init: HumanInit) {
    super(init);
    this.upperBodyOnly = init.upperBodyOnly ?? true;
  }
}

export interface RectangleInit extends ObservationInit {
  topLeft: NormalizedPoint;
  topRight: NormalizedPoint;
  bottomLeft: NormalizedPoint;
  bottomRight: NormalizedPoint;
}

export class RectangleObservation extends DetectedObjectObservation {
  readonly topLeft: NormalizedPoint;
  readonly topRight: NormalizedPoint;
  readonly bottomLeft: NormalizedPoint;
  readonly bottomRight: NormalizedPoint;

  constructor(init: RectangleInit) {
    super({ confidence: init.confidence, boundingBox: enclosingRect(init) });
    this.topLeft = init.topLeft;
    this.topRight = init.topRight;
    this.bottomLeft = init.bottomLeft;
    this.bottomRight = init.bottomRight;
  }

  static fromBoundingBox(boundingBox: NormalizedRect, confidence?: number): RectangleObservation {
    const { x, y, width, height } = boundingBox;
    return new RectangleObservation({
      confidence,
      topLeft: { x, y: y + height },
      topRight: { x: x + width, y: y + height },
      bottomLeft: { x, y },
      bottomRight: { x: x + width, y },
    });
  }
}

function enclosingRect(corners: RectangleInit): NormalizedRect {
  const points = [corners.topLeft, corners.topRight, corners.bottomLeft, corners.bottomRight];
  const xs = points.map(p => p.x);
  const ys = points.map(p => p.y);
  const x = Math.min(...xs);
  const y = Math.min(...ys);
  return { x, y, width: Math.max(...xs) - x, height: Math.max(...ys) - y };
}

/** 2x3 affine matrix `[a, b, c, d, tx, ty]`. */
export type AffineTransform = [number, number, number, number, number, number];

export interface HorizonInit extends ObservationInit {
  angle: number;
  transform?: AffineTransform;
}

export class HorizonObservation extends Observation {
  /** Radians, counter-clockwise. */
  readonly angle: number;
  readonly transform: AffineTransform;

  constructor(init: HorizonInit) {
    super(init);
    this.angle = init.angle;
    this.transform = init.transform ?? [Math.cos(init.angle), Math.sin(init.angle), -Math.sin(init.angle), Math.cos(init.angle), 0, 0];
  }
}

/** Single channel mask, row-major, first row at the top. */
export interface PixelMask {
  width: number;
  height: number;
  data: Float32Array | Uint8Array;
}

export interface PixelBufferInit extends ObservationInit {
  mask: PixelMask;
}

export class PixelBufferObservation extends Observation {
  readonly mask: PixelMask;

  constructor(init: PixelBufferInit) {
    super(init);
    this.mask = init.mask;
  }
}

export interface SaliencyInit extends PixelBufferInit {
  salientObjects?: RectangleObservation[];
}

export class SaliencyImageObservation extends PixelBufferObservation {
  readonly salientObjects: RectangleObservation[];

  constructor(init: SaliencyInit) {
    super(init);
    this.salientObjects = init.salientObjects ?? [];
  }
}

export interface Contour {
  points: NormalizedPoint[];
  children: Contour[];
}

export interface ContoursInit extends ObservationInit {
  contours: Contour[];
  aspectRatio?: number;
}

export class ContoursObservation extends Observation {
  readonly contours: Contour[];
  readonly aspectRatio: number;

  constructor(init: ContoursInit) {
    super(init);
    this.contours = init.contours;
    this.aspectRatio = init.aspectRatio ?? 1;
  }

  get contourCount(): number {
    const count = (list: Contour[]): number => list.reduce((sum, c) => sum + 1 + count(c.children), 0);
    return count(this.contours);
  }
}

export type BodyJointName =
  | 'nose'
  | 'leftEye'
  | 'rightEye'
  | 'leftEar'
  | 'rightEar'
  | 'neck'
  | 'leftShoulder'
  | 'rightShoulder'
  | 'leftElbow'
  | 'rightElbow'
  | 'leftWrist'
  | 'rightWrist'
  | 'root'
  | 'leftHip'
  | 'rightHip'
  | 'leftKnee'
  | 'rightKnee'
  | 'leftAnkle'
  | 'rightAnkle';

export interface RecognizedPoint extends NormalizedPoint {
  confidence: number;
}

export interface BodyPoseInit extends ObservationInit {
  recognizedPoints: Partial<Record<BodyJointName, RecognizedPoint>>;
}

export class HumanBodyPoseObservation extends Observation {
  readonly recognizedPoints: Partial<Record<BodyJointName, RecognizedPoint>>;

  constructor(init: BodyPoseInit) {
    super(init);
    this.recognizedPoints = init.recognizedPoints;
  }
}
