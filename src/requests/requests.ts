import { ImageBasedRequest } from './image-based-request';

export class DetectHorizonRequest extends ImageBasedRequest {
  static readonly requestName = 'DetectHorizonRequest';
}

export class AttentionSaliencyRequest extends ImageBasedRequest {
  static readonly requestName = 'AttentionSaliencyRequest';
  static readonly supportedRevisions: ReadonlySet<number> = new Set([1, 2]);
  static readonly defaultRevision = 2;
}

export class ObjectnessSaliencyRequest extends ImageBasedRequest {
  static readonly requestName = 'ObjectnessSaliencyRequest';
  static readonly supportedRevisions: ReadonlySet<number> = new Set([1, 2]);
  static readonly defaultRevision = 2;
}

export class DetectFaceRectanglesRequest extends ImageBasedRequest {
  static readonly requestName = 'DetectFaceRectanglesRequest';
  static readonly supportedRevisions: ReadonlySet<number> = new Set([1, 2, 3]);
  static readonly defaultRevision = 3;
}

export class DetectFaceLandmarksRequest extends ImageBasedRequest {
  static readonly requestName = 'DetectFaceLandmarksRequest';
  static readonly supportedRevisions: ReadonlySet<number> = new Set([1, 2, 3]);
  static readonly defaultRevision = 3;
}

export class DetectFaceCaptureQualityRequest extends ImageBasedRequest {
  static readonly requestName = 'DetectFaceCaptureQualityRequest';
  static readonly supportedRevisions: ReadonlySet<number> = new Set([1, 2, 3]);
  static readonly defaultRevision = 3;
}

export class DetectHumanRectanglesRequest extends ImageBasedRequest {
  static readonly requestName = 'DetectHumanRectanglesRequest';
  static readonly supportedRevisions: ReadonlySet<number> = new Set([1, 2]);
  static readonly defaultRevision = 2;

  /** When false the detector reports full-body boxes. */
  upperBodyOnly = true;
}

export type SegmentationQualityLevel = 'fast' | 'balanced' | 'accurate';

export class GeneratePersonSegmentationRequest extends ImageBasedRequest {
  static readonly requestName = 'GeneratePersonSegmentationRequest';

  qualityLevel: SegmentationQualityLevel = 'balanced';
}

export class DetectDocumentSegmentationRequest extends ImageBasedRequest {
  static readonly requestName = 'DetectDocumentSegmentationRequest';
}

export class DetectContoursRequest extends ImageBasedRequest {
  static readonly requestName = 'DetectContoursRequest';
}

export class DetectHumanBodyPoseRequest extends ImageBasedRequest {
  static readonly requestName = 'DetectHumanBodyPoseRequest';
}

export class DetectRectanglesRequest extends ImageBasedRequest {
  static readonly requestName = 'DetectRectanglesRequest';
}
