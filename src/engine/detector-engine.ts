import { UnsupportedRequestError } from '../errors';
import type { ImageBasedRequest, RequestType, RequestTypeInfo } from '../requests/image-based-request';
import type { ImageInput } from '../types';
import type { Observation } from '../types/observations';
import { BASELINE_CAPABILITY_LEVEL } from '../tasks/vision-task';
import type { ImageAnalysisEngine } from './image-analysis-engine';
import { sharedImageContext, type DecodedImage, type ImageContext } from './image-context';

/**
 * Produces observations for one request type. Observations are normalized to
 * the image it receives, which is already cropped to the request's region of
 * interest.
 */
export interface Detector<R extends ImageBasedRequest = ImageBasedRequest> {
  detect(image: DecodedImage, request: R, context: ImageContext): Promise<Observation[]>;
  release?(): Promise<void>;
}

export interface DetectorEngineOptions {
  capabilityLevel?: number;
}

/**
 * An engine that decodes the image once and hands every request to the
 * detector registered for its class.
 */
export class DetectorEngine implements ImageAnalysisEngine {
  readonly capabilityLevel: number;
  private readonly detectors = new Map<RequestTypeInfo, Detector>();

  constructor(options: DetectorEngineOptions = {}) {
    this.capabilityLevel = options.capabilityLevel ?? BASELINE_CAPABILITY_LEVEL;
  }

  register<R extends ImageBasedRequest>(type: RequestType<R>, detector: Detector<R>): this {
    this.detectors.set(type, detector);
    return this;
  }

  unregister(type: RequestTypeInfo): boolean {
    return this.detectors.delete(type);
  }

  supports(type: RequestTypeInfo): boolean {
    return this.detectors.has(type);
  }

  /**
   * Foreground requests run concurrently first; requests that prefer
   * background processing start once those have completed.
   */
  async perform(image: ImageInput, requests: ImageBasedRequest[], context: ImageContext = sharedImageContext): Promise<void> {
    const decoded = await context.decode(image);

    const foreground = requests.filter(request => !request.preferBackgroundProcessing);
    const background = requests.filter(request => request.preferBackgroundProcessing);

    await Promise.all(foreground.map(request => this.run(decoded, request, context)));
    await Promise.all(background.map(request => this.run(decoded, request, context)));
  }

  async release(): Promise<void> {
    const detectors = new Set(this.detectors.values());
    for (const detector of detectors) {
      try {
        await detector.release?.();
      } catch (error) {
        console.error('Error releasing detector:', error);
      }
    }
  }

  private async run(image: DecodedImage, request: ImageBasedRequest, context: ImageContext): Promise<void> {
    const detector = this.detectors.get(request.type);
    if (!detector) {
      request.fail(new UnsupportedRequestError(request.name));
      return;
    }

    try {
      const region = await context.crop(image, request.regionOfInterest);
      request.complete(await detector.detect(region, request, context));
    } catch (error) {
      request.fail(error instanceof Error ? error : new Error(String(error)));
    }
  }
}
