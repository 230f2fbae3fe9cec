import type { ImageContext } from './engine/image-context';
import type { ImageBasedRequest } from './requests/image-based-request';
import type { VisionTask } from './tasks/vision-task';
import type { NormalizedRect } from './types/geometry';
import type { Observation } from './types/observations';
import type { RuntimeSession } from './types/runtime';

/** Encoded image bytes or a path to an image file. */
export type ImageInput = Buffer | Uint8Array | string;

export interface PerformOptions {
  regionOfInterest?: NormalizedRect;
  revision?: number;
  preferBackgroundProcessing?: boolean;
  /** Defaults to the process-wide shared context. */
  imageContext?: ImageContext;
}

export interface TaskResult {
  task: VisionTask;
  /** Position of `task` in the submitted list. */
  index: number;
  request: ImageBasedRequest;
  observations: Observation[];
  error?: Error;
}

export interface DetectionOptions {
  /** Keep only these class indices; all classes when omitted. */
  classes?: number[];
  iouThreshold?: number;
  confidenceThreshold?: number;
  targetSize?: [number, number];
  inputShape?: 'NCHW' | 'NHWC';
}

export interface SessionOptions {
  enableCpuMemArena?: boolean;
  enableMemPattern?: boolean;
}

export interface SessionManager<S extends RuntimeSession = RuntimeSession> {
  get(modelPath: string): Promise<S>;
  release(modelPath: string): Promise<void>;
  releaseAll(): Promise<void>;
}
