import { describe, expect, it } from 'vitest';

import type { BatchItem, BatchResponse, PredictionResponse } from '../lib/schemas';
import type { Timed, UploadImage } from './api-client';
import { type BenchmarkTarget, runBenchmark, summarize } from './runner';

const image = (filename: string): UploadImage => ({ data: Buffer.from(filename), filename });

const prediction = (file: string, latency: number): Timed<PredictionResponse> => ({
  file,
  conf_threshold: 0.25,
  detections: [],
  n_boxes: 0,
  class_counts: {},
  latency_ms: latency,
  clientLatencyMs: latency + 5,
});

class FakeTarget implements BenchmarkTarget {
  inFlight = 0;
  maxInFlight = 0;
  calls: string[] = [];

  constructor(private readonly failOn: string[] = []) {}

  async predict(upload: UploadImage): Promise<Timed<PredictionResponse>> {
    this.calls.push(upload.filename);
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    await new Promise((resolve) => setTimeout(resolve, 5));
    this.inFlight -= 1;

    if (this.failOn.includes(upload.filename)) {
      throw new Error('Request failed with status code 400');
    }
    return prediction(upload.filename, 10 * this.calls.length);
  }

  async predictBatch(uploads: UploadImage[]): Promise<Timed<BatchResponse>> {
    return {
      batch_size: uploads.length,
      conf_threshold: 0.25,
      results: uploads.map((upload, i): BatchItem =>
        this.failOn.includes(upload.filename)
          ? { ok: false, file: upload.filename, error: 'image_decode_error', detail: 'x' }
          : { ...prediction(upload.filename, 10 * (i + 1)), ok: true },
      ),
      avg_latency_ms: 20,
      batch_latency_ms: 2000,
      clientLatencyMs: 2100,
    };
  }
}

describe('runBenchmark', () => {
  it('sends sequential requests one after another and counts failures', async () => {
    const target = new FakeTarget(['b.jpg']);

    const report = await runBenchmark(target, [image('a.jpg'), image('b.jpg'), image('c.jpg')], {
      mode: 'sequential',
      conf: 0.25,
    });

    expect(target.calls).toEqual(['a.jpg', 'b.jpg', 'c.jpg']);
    expect(target.maxInFlight).toBe(1);
    expect(report.requests).toBe(3);
    expect(report.errors).toBe(1);
    expect(report.failures).toEqual(['Request failed with status code 400']);
    expect(report.serverLatenciesMs).toEqual([10, 30]);
    expect(report.clientLatenciesMs).toEqual([15, 35]);
  });

  it('bounds parallel requests by the concurrency', async () => {
    const target = new FakeTarget();
    const images = Array.from({ length: 8 }, (_, i) => image(`${i}.jpg`));

    const report = await runBenchmark(target, images, {
      mode: 'parallel',
      conf: 0.25,
      concurrency: 3,
    });

    expect(target.calls).toHaveLength(8);
    expect(target.maxInFlight).toBe(3);
    expect(report.errors).toBe(0);
    expect(report.serverLatenciesMs).toHaveLength(8);
  });

  it('uses the server batch time for batch throughput', async () => {
    const target = new FakeTarget(['c.jpg']);

    const report = await runBenchmark(
      target,
      [image('a.jpg'), image('b.jpg'), image('c.jpg'), image('d.jpg')],
      { mode: 'batch', conf: 0.25 },
    );

    expect(report.elapsedSeconds).toBe(2);
    expect(report.errors).toBe(1);
    expect(report.failures).toEqual(['c.jpg: image_decode_error']);
    expect(report.throughput).toBe(1.5);
    expect(report.serverLatenciesMs).toEqual([10, 20, 40]);
    expect(report.clientLatenciesMs).toEqual([2100]);
  });
});

describe('summarize', () => {
  it('renders rounded percentiles and dashes for empty samples', () => {
    const row = summarize({
      mode: 'sequential',
      requests: 2,
      errors: 2,
      failures: ['x', 'y'],
      elapsedSeconds: 1.234,
      throughput: 0,
      serverLatenciesMs: [],
      clientLatenciesMs: [],
    });

    expect(row).toEqual({
      mode: 'sequential',
      requests: 2,
      errors: 2,
      'total (s)': 1.23,
      'throughput (img/s)': 0,
      'server p50 (ms)': '-',
      'server p95 (ms)': '-',
      'client p50 (ms)': '-',
      'client p95 (ms)': '-',
    });
  });
});
