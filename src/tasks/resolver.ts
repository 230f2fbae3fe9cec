import type { RequestType } from '../requests/image-based-request';
import {
  AttentionSaliencyRequest,
  DetectContoursRequest,
  DetectDocumentSegmentationRequest,
  DetectFaceCaptureQualityRequest,
  DetectFaceLandmarksRequest,
  DetectFaceRectanglesRequest,
  DetectHorizonRequest,
  DetectHumanBodyPoseRequest,
  DetectHumanRectanglesRequest,
  DetectRectanglesRequest,
  GeneratePersonSegmentationRequest,
  ObjectnessSaliencyRequest,
} from '../requests/requests';
import {
  ContoursObservation,
  FaceObservation,
  HorizonObservation,
  HumanBodyPoseObservation,
  HumanObservation,
  PixelBufferObservation,
  RectangleObservation,
  SaliencyImageObservation,
  type ObservationType,
} from '../types/observations';
import type { VisionTask } from './vision-task';

// The capability gate already ran when the task was constructed.

export function resolveRequestType(task: VisionTask): RequestType {
  const kind = task.kind;
  switch (kind.type) {
    case 'horizonDetection':
      return DetectHorizonRequest;
    case 'saliency':
      return kind.mode === 'attention' ? AttentionSaliencyRequest : ObjectnessSaliencyRequest;
    case 'faceDetection':
      return DetectFaceRectanglesRequest;
    case 'faceLandmarkDetection':
      return DetectFaceLandmarksRequest;
    case 'humanRectanglesDetection':
      return DetectHumanRectanglesRequest;
    case 'faceCaptureQuality':
      return DetectFaceCaptureQualityRequest;
    case 'personSegmentation':
      return GeneratePersonSegmentationRequest;
    case 'documentSegmentation':
      return DetectDocumentSegmentationRequest;
    case 'contourDetection':
      return DetectContoursRequest;
    case 'humanBodyPoseDetection':
      return DetectHumanBodyPoseRequest;
    case 'rectangleDetection':
      return DetectRectanglesRequest;
  }
}

export function resolveObservationType(task: VisionTask): ObservationType {
  switch (task.kind.type) {
    case 'horizonDetection':
      return HorizonObservation;
    case 'saliency':
      return SaliencyImageObservation;
    case 'faceDetection':
    case 'faceLandmarkDetection':
    case 'faceCaptureQuality':
      return FaceObservation;
    case 'humanRectanglesDetection':
      return HumanObservation;
    case 'personSegmentation':
      return PixelBufferObservation;
    case 'documentSegmentation':
    case 'rectangleDetection':
      return RectangleObservation;
    case 'contourDetection':
      return ContoursObservation;
    case 'humanBodyPoseDetection':
      return HumanBodyPoseObservation;
  }
}
