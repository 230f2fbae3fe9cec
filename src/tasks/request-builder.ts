import type { CompletionHandler, ImageBasedRequest } from '../requests/image-based-request';
import { DetectHumanRectanglesRequest, GeneratePersonSegmentationRequest } from '../requests/requests';
import type { NormalizedRect } from '../types/geometry';
import { resolveRequestType } from './resolver';
import type { VisionTask } from './vision-task';

export interface RequestOptions {
  regionOfInterest?: NormalizedRect;
  revision?: number;
  preferBackgroundProcessing?: boolean;
}

/**
 * Creates the engine request for a task. A revision the request type does not
 * support is ignored and the type's default revision stays in effect.
 */
export function buildRequest(
  task: VisionTask,
  options: RequestOptions,
  completion: CompletionHandler,
): ImageBasedRequest {
  const requestType = resolveRequestType(task);
  const request = new requestType(completion);

  const kind = task.kind;
  if (kind.type === 'humanRectanglesDetection' && request instanceof DetectHumanRectanglesRequest) {
    request.upperBodyOnly = kind.upperBodyOnly;
  }
  if (kind.type === 'personSegmentation' && request instanceof GeneratePersonSegmentationRequest) {
    request.qualityLevel = kind.qualityLevel;
  }

  if (options.regionOfInterest) {
    request.regionOfInterest = { ...options.regionOfInterest };
  }
  if (options.preferBackgroundProcessing) {
    request.preferBackgroundProcessing = true;
  }
  if (options.revision !== undefined && requestType.supportedRevisions.has(options.revision)) {
    request.revision = options.revision;
  }

  return request;
}
