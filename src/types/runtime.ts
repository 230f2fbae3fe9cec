import type { SessionOptions } from '../types';

export interface RuntimeTensor {
  readonly data: unknown;
  readonly dims: readonly number[];
  dispose?(): void;
}

export interface RuntimeSession {
  readonly inputNames: readonly string[];
  readonly outputNames: readonly string[];
}

export type FeedsType<T extends RuntimeTensor = RuntimeTensor> = { [key: string]: T };

export interface RuntimeProvider<S extends RuntimeSession = RuntimeSession, T extends RuntimeTensor = RuntimeTensor> {
  createSession(modelPath: string, options?: SessionOptions): Promise<S>;
  createTensor(type: 'float32', data: Float32Array, dims: number[]): T;
  run(session: S, feeds: FeedsType<T>): Promise<{ readonly [key: string]: RuntimeTensor }>;
  release(session: S): Promise<void>;
}
