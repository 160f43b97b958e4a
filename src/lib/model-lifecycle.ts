import { LoadError, NotReadyError } from './errors';
import type { Detector } from './type';

export type ModelState = 'starting' | 'ready';

/**
 * Owns the single detector instance of this process.
 * Loading happens at most once on success; a failed load leaves the state at
 * `starting` so a later warmup can try again. Once ready it never goes back.
 */
export class ModelLifecycle<T extends Detector = Detector> {
  private handle: T | null = null;
  private loading: Promise<T> | null = null;

  constructor(private readonly loader: () => Promise<T>) {}

  get state(): ModelState {
    return this.handle ? 'ready' : 'starting';
  }

  get ready(): boolean {
    return this.handle !== null;
  }

  warmup(): Promise<T> {
    if (this.handle) {
      return Promise.resolve(this.handle);
    }

    if (!this.loading) {
      const started = Date.now();
      this.loading = this.loader().then(
        (handle) => {
          this.handle = handle;
          console.log(`Model loaded in ${Date.now() - started} ms`);
          return handle;
        },
        (error: unknown) => {
          this.loading = null;
          throw error instanceof LoadError
            ? error
            : new LoadError('Model failed to load', { cause: error });
        },
      );
    }

    return this.loading;
  }

  /** The loaded detector; throws `NotReadyError` before the first successful load. */
  current(): T {
    if (!this.handle) {
      throw new NotReadyError();
    }
    return this.handle;
  }

  dispose() {
    this.handle?.dispose();
  }
}
