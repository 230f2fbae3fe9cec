import type { ImageBasedRequest } from '../requests/image-based-request';
import type { ImageInput } from '../types';
import type { ImageContext } from './image-context';

/**
 * The detection engine the task layer drives.
 *
 * `perform` rejects only when the batch cannot be submitted at all (for
 * example an undecodable image), and in that case completes no request.
 * Otherwise it completes every request exactly once before it resolves.
 */
export interface ImageAnalysisEngine {
  /** Gates which task kinds can be constructed for this engine. */
  readonly capabilityLevel: number;
  perform(image: ImageInput, requests: ImageBasedRequest[], context: ImageContext): Promise<void>;
}
