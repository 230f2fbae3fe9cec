import { readFile } from 'node:fs/promises';
import { InferenceSession, Tensor, env } from 'onnxruntime-web';
import type { SessionOptions } from '../types';
import type { FeedsType, RuntimeProvider } from '../types/runtime';

/** ONNX Runtime through its WebAssembly backend, which also runs under Node. */
export class WebRuntimeProvider implements RuntimeProvider<InferenceSession, Tensor> {
  constructor(numThreads = 1) {
    env.wasm.numThreads = numThreads;
  }

  async createSession(modelPath: string, options: SessionOptions = {}): Promise<InferenceSession> {
    const model = new Uint8Array(await readFile(modelPath));
    return InferenceSession.create(model, {
      executionProviders: ['wasm'],
      graphOptimizationLevel: 'all',
      enableCpuMemArena: options.enableCpuMemArena ?? true,
      enableMemPattern: options.enableMemPattern ?? true,
    });
  }

  createTensor(type: 'float32', data: Float32Array, dims: number[]): Tensor {
    return new Tensor(type, data, dims);
  }

  async run(session: InferenceSession, feeds: FeedsType<Tensor>): Promise<InferenceSession.OnnxValueMapType> {
    return session.run(feeds);
  }

  async release(session: InferenceSession): Promise<void> {
    try {
      await session.release();
    } catch (error) {
      console.error('Error releasing session:', error);
    }
  }
}
