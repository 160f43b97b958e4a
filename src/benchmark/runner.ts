import { Semaphore, round } from 'es-toolkit';

import type { BatchResponse, PredictionResponse } from '../lib/schemas';
import type { Timed, UploadImage } from './api-client';
import { percentile, throughput } from './stats';

export type BenchmarkMode = 'sequential' | 'parallel' | 'batch';

/** What a benchmark run needs from the API; `DetectionApiClient` implements it. */
export interface BenchmarkTarget {
  predict(image: UploadImage, conf: number): Promise<Timed<PredictionResponse>>;
  predictBatch(images: UploadImage[], conf: number): Promise<Timed<BatchResponse>>;
}

export interface BenchmarkOptions {
  mode: BenchmarkMode;
  conf: number;
  concurrency?: number;
}

export interface BenchmarkReport {
  mode: BenchmarkMode;
  requests: number;
  errors: number;
  failures: string[];
  elapsedSeconds: number;
  throughput: number;
  serverLatenciesMs: number[];
  clientLatenciesMs: number[];
}

export async function runBenchmark(
  target: BenchmarkTarget,
  images: UploadImage[],
  { mode, conf, concurrency = 4 }: BenchmarkOptions,
): Promise<BenchmarkReport> {
  const serverLatenciesMs: number[] = [];
  const clientLatenciesMs: number[] = [];
  const failures: string[] = [];

  const predictOne = async (image: UploadImage) => {
    try {
      const response = await target.predict(image, conf);
      serverLatenciesMs.push(response.latency_ms);
      clientLatenciesMs.push(response.clientLatencyMs);
    } catch (error) {
      failures.push(error instanceof Error ? error.message : String(error));
    }
  };

  const started = performance.now();
  let elapsedSeconds: number;

  if (mode === 'batch') {
    try {
      const response = await target.predictBatch(images, conf);
      for (const item of response.results) {
        if (item.ok) {
          serverLatenciesMs.push(item.latency_ms);
        } else {
          failures.push(`${item.file}: ${item.error}`);
        }
      }
      clientLatenciesMs.push(response.clientLatencyMs);
      elapsedSeconds = response.batch_latency_ms / 1000;
    } catch (error) {
      images.forEach(() => failures.push(error instanceof Error ? error.message : String(error)));
      elapsedSeconds = (performance.now() - started) / 1000;
    }
  } else {
    if (mode === 'sequential') {
      for (const image of images) {
        await predictOne(image);
      }
    } else {
      const semaphore = new Semaphore(Math.max(1, concurrency));
      await Promise.all(
        images.map(async (image) => {
          await semaphore.acquire();
          try {
            await predictOne(image);
          } finally {
            semaphore.release();
          }
        }),
      );
    }
    elapsedSeconds = (performance.now() - started) / 1000;
  }

  const errors = failures.length;

  return {
    mode,
    requests: images.length,
    errors,
    failures,
    elapsedSeconds,
    throughput: throughput(images.length - errors, elapsedSeconds),
    serverLatenciesMs,
    clientLatenciesMs,
  };
}

const ms = (value: number) => (Number.isNaN(value) ? '-' : round(value, 1));

export function summarize(report: BenchmarkReport) {
  return {
    mode: report.mode,
    requests: report.requests,
    errors: report.errors,
    'total (s)': round(report.elapsedSeconds, 2),
    'throughput (img/s)': Number.isNaN(report.throughput) ? '-' : round(report.throughput, 2),
    'server p50 (ms)': ms(percentile(report.serverLatenciesMs, 50)),
    'server p95 (ms)': ms(percentile(report.serverLatenciesMs, 95)),
    'client p50 (ms)': ms(percentile(report.clientLatenciesMs, 50)),
    'client p95 (ms)': ms(percentile(report.clientLatenciesMs, 95)),
  };
}
