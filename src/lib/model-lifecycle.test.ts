import { describe, expect, it, vi } from 'vitest';

import { LoadError, NotReadyError } from './errors';
import { ModelLifecycle } from './model-lifecycle';
import type { Detector } from './type';

const fakeDetector = (): Detector => ({ detect: () => [], dispose: vi.fn() });

describe('ModelLifecycle', () => {
  it('starts out not ready', () => {
    const lifecycle = new ModelLifecycle(async () => fakeDetector());

    expect(lifecycle.state).toBe('starting');
    expect(lifecycle.ready).toBe(false);
    expect(() => lifecycle.current()).toThrow(NotReadyError);
  });

  it('becomes ready after warmup', async () => {
    const detector = fakeDetector();
    const lifecycle = new ModelLifecycle(async () => detector);

    await lifecycle.warmup();

    expect(lifecycle.state).toBe('ready');
    expect(lifecycle.current()).toBe(detector);
  });

  it('loads once for repeated and concurrent warmups', async () => {
    const loader = vi.fn(async () => fakeDetector());
    const lifecycle = new ModelLifecycle(loader);

    const [a, b] = await Promise.all([lifecycle.warmup(), lifecycle.warmup()]);
    const c = await lifecycle.warmup();

    expect(loader).toHaveBeenCalledTimes(1);
    expect(a).toBe(b);
    expect(b).toBe(c);
  });

  it('stays starting after a failed load and retries on the next warmup', async () => {
    const loader = vi
      .fn<() => Promise<Detector>>()
      .mockRejectedValueOnce(new Error('ENOENT: model.json'))
      .mockResolvedValueOnce(fakeDetector());
    const lifecycle = new ModelLifecycle(loader);

    await expect(lifecycle.warmup()).rejects.toBeInstanceOf(LoadError);
    expect(lifecycle.ready).toBe(false);

    await lifecycle.warmup();
    expect(lifecycle.ready).toBe(true);
    expect(loader).toHaveBeenCalledTimes(2);
  });

  it('disposes the loaded detector', async () => {
    const detector = fakeDetector();
    const lifecycle = new ModelLifecycle(async () => detector);
    await lifecycle.warmup();

    lifecycle.dispose();

    expect(detector.dispose).toHaveBeenCalledTimes(1);
  });
});
