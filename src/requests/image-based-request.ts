import { FULL_IMAGE, type NormalizedRect } from '../types/geometry';
import type { Observation } from '../types/observations';

export type CompletionHandler = (request: ImageBasedRequest, error?: Error) => void;

/** Static side shared by every request class. */
export interface RequestTypeInfo {
  readonly requestName: string;
  readonly supportedRevisions: ReadonlySet<number>;
  readonly defaultRevision: number;
}

export type RequestType<R extends ImageBasedRequest = ImageBasedRequest> =
  (new (completionHandler?: CompletionHandler) => R) & RequestTypeInfo;

/**
 * A unit of work handed to an image-analysis engine. The engine fills
 * `results` and completes the request exactly once.
 */
export abstract class ImageBasedRequest {
  static readonly requestName: string = 'ImageBasedRequest';
  static readonly supportedRevisions: ReadonlySet<number> = new Set([1]);
  static readonly defaultRevision: number = 1;

  readonly type: RequestTypeInfo;
  regionOfInterest: NormalizedRect = { ...FULL_IMAGE };
  preferBackgroundProcessing = false;
  revision: number;
  results?: Observation[];

  private completed = false;
  private readonly completionHandler?: CompletionHandler;

  constructor(completionHandler?: CompletionHandler) {
    this.type = new.target;
    this.revision = new.target.defaultRevision;
    this.completionHandler = completionHandler;
  }

  get name(): string {
    return this.type.requestName;
  }

  get isCompleted(): boolean {
    return this.completed;
  }

  complete(results: Observation[]): void {
    if (this.completed) return;
    this.completed = true;
    this.results = results;
    this.completionHandler?.(this);
  }

  fail(error: Error): void {
    if (this.completed) return;
    this.completed = true;
    this.completionHandler?.(this, error);
  }
}
