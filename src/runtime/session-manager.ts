import type { SessionManager, SessionOptions } from '../types';
import type { FeedsType, RuntimeProvider, RuntimeSession, RuntimeTensor } from '../types/runtime';

export interface OrtSessionManagerOptions {
  maxSessions?: number;
  sessionOptions?: SessionOptions;
}

/**
 * Caches one inference session per model path. The least recently created
 * session is released when the cache is full.
 */
export class OrtSessionManager<S extends RuntimeSession = RuntimeSession, T extends RuntimeTensor = RuntimeTensor>
  implements SessionManager<S>
{
  private static readonly DEFAULT_MAX_SESSIONS = 5;
  private static readonly DEFAULT_OPTIONS: SessionOptions = {
    enableCpuMemArena: true,
    enableMemPattern: true,
  };

  private readonly sessions = new Map<string, Promise<S>>();
  private readonly maxSessions: number;
  private readonly sessionOptions: SessionOptions;

  constructor(
    readonly provider: RuntimeProvider<S, T>,
    options: OrtSessionManagerOptions = {},
  ) {
    this.maxSessions = options.maxSessions ?? OrtSessionManager.DEFAULT_MAX_SESSIONS;
    this.sessionOptions = { ...OrtSessionManager.DEFAULT_OPTIONS, ...options.sessionOptions };
  }

  async get(modelPath: string): Promise<S> {
    const cached = this.sessions.get(modelPath);
    if (cached) return cached;

    if (this.sessions.size >= this.maxSessions) {
      const oldest = this.sessions.keys().next().value;
      if (oldest !== undefined) await this.release(oldest);
    }

    const pending = this.provider.createSession(modelPath, this.sessionOptions);
    this.sessions.set(modelPath, pending);
    try {
      return await pending;
    } catch (error) {
      this.sessions.delete(modelPath);
      throw error;
    }
  }

  createTensor(data: Float32Array, dims: number[]): T {
    return this.provider.createTensor('float32', data, dims);
  }

  async run(session: S, feeds: FeedsType<T>): Promise<{ readonly [key: string]: RuntimeTensor }> {
    return this.provider.run(session, feeds);
  }

  async release(modelPath: string): Promise<void> {
    const pending = this.sessions.get(modelPath);
    if (!pending) return;
    this.sessions.delete(modelPath);
    try {
      await this.provider.release(await pending);
    } catch (error) {
      console.error(`Error releasing session for ${modelPath}:`, error);
    }
  }

  async releaseAll(): Promise<void> {
    await Promise.all([...this.sessions.keys()].map(modelPath => this.release(modelPath)));
  }

  getSessionStats(): { currentSessions: number; maxSessions: number } {
    return {
      currentSessions: this.sessions.size,
      maxSessions: this.maxSessions,
    };
  }
}
