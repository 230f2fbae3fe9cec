import { RequestNotCompletedError } from '../errors';
import type { ImageBasedRequest } from '../requests/image-based-request';
import type { VisionTask } from '../tasks/vision-task';
import type { TaskResult } from '../types';

/**
 * Collects one `TaskResult` per submitted request, in the order the engine
 * completes them.
 */
export class CompletionJoin {
  private readonly results: TaskResult[] = [];
  private readonly pending: Map<number, { task: VisionTask; request: ImageBasedRequest }> = new Map();

  constructor(private readonly tasks: readonly VisionTask[]) {}

  get expected(): number {
    return this.tasks.length;
  }

  get received(): number {
    return this.results.length;
  }

  /** Registers the request built for `tasks[index]`. */
  track(index: number, request: ImageBasedRequest): void {
    this.pending.set(index, { task: this.tasks[index], request });
  }

  record(index: number, request: ImageBasedRequest, error?: Error): void {
    if (!this.pending.delete(index)) return;
    this.results.push({
      task: this.tasks[index],
      index,
      request,
      observations: error ? [] : [...(request.results ?? [])],
      error,
    });
  }

  /**
   * Closes the join once the engine has returned. Requests the engine never
   * completed are failed, so a late completion from the engine is ignored.
   */
  settle(): TaskResult[] {
    for (const [index, { request }] of [...this.pending]) {
      const error = new RequestNotCompletedError(request.name);
      request.fail(error);
      // a request built without this join as its handler
      this.record(index, request, error);
    }
    return [...this.results];
  }
}
