import { UnsupportedTaskError } from '../errors';
import type { SegmentationQualityLevel } from '../requests/requests';

export type SaliencyMode = 'attention' | 'object';

export type VisionTaskKind =
  | { type: 'horizonDetection' }
  | { type: 'saliency'; mode: SaliencyMode }
  | { type: 'faceDetection' }
  | { type: 'faceLandmarkDetection' }
  | { type: 'humanRectanglesDetection'; upperBodyOnly: boolean }
  | { type: 'faceCaptureQuality' }
  | { type: 'personSegmentation'; qualityLevel: SegmentationQualityLevel }
  | { type: 'documentSegmentation' }
  | { type: 'contourDetection' }
  | { type: 'humanBodyPoseDetection' }
  | { type: 'rectangleDetection' };

export type VisionTaskType = VisionTaskKind['type'];

export const BASELINE_CAPABILITY_LEVEL = 13;

export const MINIMUM_CAPABILITY_LEVEL: Readonly<Record<VisionTaskType, number>> = {
  horizonDetection: 13,
  saliency: 13,
  faceDetection: 13,
  faceLandmarkDetection: 13,
  faceCaptureQuality: 13,
  rectangleDetection: 13,
  contourDetection: 14,
  humanBodyPoseDetection: 14,
  humanRectanglesDetection: 15,
  personSegmentation: 15,
  documentSegmentation: 15,
};

/**
 * An immutable description of one analysis to run against an image.
 *
 * Tasks whose kind needs a newer engine are only reachable through the
 * gated factories, which take the engine's capability level.
 */
export class VisionTask {
  static readonly horizonDetection = new VisionTask({ type: 'horizonDetection' });
  static readonly attentionSaliency = new VisionTask({ type: 'saliency', mode: 'attention' });
  static readonly objectnessSaliency = new VisionTask({ type: 'saliency', mode: 'object' });
  static readonly faceDetection = new VisionTask({ type: 'faceDetection' });
  static readonly faceLandmarkDetection = new VisionTask({ type: 'faceLandmarkDetection' });
  static readonly faceCaptureQuality = new VisionTask({ type: 'faceCaptureQuality' });
  static readonly rectangleDetection = new VisionTask({ type: 'rectangleDetection' });

  readonly kind: Readonly<VisionTaskKind>;

  private constructor(kind: VisionTaskKind) {
    this.kind = Object.freeze({ ...kind });
  }

  static saliency(mode: SaliencyMode): VisionTask {
    return mode === 'attention' ? VisionTask.attentionSaliency : VisionTask.objectnessSaliency;
  }

  static contourDetection(capabilityLevel: number): VisionTask {
    return VisionTask.gated({ type: 'contourDetection' }, capabilityLevel);
  }

  static humanBodyPoseDetection(capabilityLevel: number): VisionTask {
    return VisionTask.gated({ type: 'humanBodyPoseDetection' }, capabilityLevel);
  }

  static humanRectanglesDetection(capabilityLevel: number, upperBodyOnly = true): VisionTask {
    return VisionTask.gated({ type: 'humanRectanglesDetection', upperBodyOnly }, capabilityLevel);
  }

  static personSegmentation(capabilityLevel: number, qualityLevel: SegmentationQualityLevel = 'balanced'): VisionTask {
    return VisionTask.gated({ type: 'personSegmentation', qualityLevel }, capabilityLevel);
  }

  static documentSegmentation(capabilityLevel: number): VisionTask {
    return VisionTask.gated({ type: 'documentSegmentation' }, capabilityLevel);
  }

  static isAvailable(type: VisionTaskType, capabilityLevel: number): boolean {
    return capabilityLevel >= MINIMUM_CAPABILITY_LEVEL[type];
  }

  private static gated(kind: VisionTaskKind, capabilityLevel: number): VisionTask {
    if (!VisionTask.isAvailable(kind.type, capabilityLevel)) {
      throw new UnsupportedTaskError(kind.type, MINIMUM_CAPABILITY_LEVEL[kind.type], capabilityLevel);
    }
    return new VisionTask(kind);
  }

  get type(): VisionTaskType {
    return this.kind.type;
  }

  /** Stable identity, e.g. `saliency:attention`. */
  get key(): string {
    const kind = this.kind;
    switch (kind.type) {
      case 'saliency':
        return `saliency:${kind.mode}`;
      case 'humanRectanglesDetection':
        return `humanRectanglesDetection:${kind.upperBodyOnly ? 'upperBody' : 'fullBody'}`;
      case 'personSegmentation':
        return `personSegmentation:${kind.qualityLevel}`;
      default:
        return kind.type;
    }
  }

  equals(other: VisionTask): boolean {
    return this.key === other.key;
  }

  toString(): string {
    return `VisionTask(${this.key})`;
  }
}
