import axios, { type AxiosInstance } from 'axios';
import { delay } from 'es-toolkit';
import { z } from 'zod';

import { TrackingError } from './errors';

/** One completed request, as reported to the tracking server. */
export interface MetricEvent {
  kind: 'single' | 'batch';
  timestamp: number;
  confidence: number;
  /** inference latency for a single image, wall time of the whole call for a batch */
  latencyMs: number;
  nBoxes: number;
  classCounts: Record<string, number>;
  batchSize?: number;
  avgLatencyMs?: number;
}

export interface TrackingClientOptions {
  /** base URL of the MLflow server; tracking is off without one */
  trackingUri?: string;
  experimentName: string;
  runNamePrefix?: string;
  /** logged as run params alongside `conf` */
  params?: Record<string, string>;
  maxQueueSize?: number;
  timeoutMs?: number;
  http?: AxiosInstance;
}

interface RunPayload {
  runName: string;
  metrics: Record<string, number>;
  params: Record<string, string>;
}

const GetExperimentResponse = z.object({
  experiment: z.object({ experiment_id: z.string() }),
});
const CreateExperimentResponse = z.object({ experiment_id: z.string() });
const CreateRunResponse = z.object({
  run: z.object({ info: z.object({ run_id: z.string() }) }),
});

export function classMetricKey(label: string): string {
  const slug = label
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return `class_${slug || 'unknown'}_count`;
}

export function toRunPayload(
  event: MetricEvent,
  staticParams: Record<string, string> = {},
): RunPayload {
  const classMetrics: Record<string, number> = {};
  for (const [label, count] of Object.entries(event.classCounts)) {
    const key = classMetricKey(label);
    classMetrics[key] = (classMetrics[key] ?? 0) + count;
  }

  const params = { conf: String(event.confidence), ...staticParams };

  if (event.kind === 'single') {
    return {
      runName: 'inference',
      metrics: { latency_ms: event.latencyMs, n_boxes: event.nBoxes, ...classMetrics },
      params,
    };
  }

  return {
    runName: 'batch_inference',
    metrics: {
      batch_latency_ms: event.latencyMs,
      avg_latency_ms: event.avgLatencyMs ?? 0,
      batch_size: event.batchSize ?? 0,
      n_boxes_total: event.nBoxes,
      ...classMetrics,
    },
    params,
  };
}

/**
 * Fire-and-forget reporter for MLflow.
 *
 * `record` only enqueues; a single drain loop posts events one at a time. Each event
 * gets exactly one attempt and failures are logged, so callers never observe the
 * tracking server's availability.
 */
export class TrackingClient {
  private readonly baseUrl: string | undefined;
  private readonly http: AxiosInstance;
  private readonly maxQueueSize: number;
  private queue: MetricEvent[] = [];
  private draining: Promise<void> | null = null;
  private experimentId: string | null = null;

  constructor(private readonly options: TrackingClientOptions) {
    this.baseUrl = options.trackingUri?.replace(/\/+$/, '');
    this.maxQueueSize = options.maxQueueSize ?? 10_000;
    this.http = options.http ?? axios.create({ timeout: options.timeoutMs ?? 5_000 });
  }

  get enabled(): boolean {
    return this.baseUrl !== undefined;
  }

  record(event: MetricEvent): void {
    if (!this.enabled) return;

    if (this.queue.length >= this.maxQueueSize) {
      console.warn('[tracking] queue is full, dropping metric event');
      return;
    }

    this.queue.push(event);
    this.draining ??= this.drain();
  }

  /** Resolves once every queued event has been sent or dropped. */
  async flush(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  private async drain(): Promise<void> {
    try {
      // record() must return before any tracking work starts
      await delay(0);

      let event = this.queue.shift();
      while (event) {
        const payload = toRunPayload(event, this.options.params);
        try {
          await this.logRun(payload, event.timestamp);
        } catch (error) {
          const failure = new TrackingError(`failed to log ${payload.runName} run`, {
            cause: error,
          });
          console.warn(`[tracking] ${failure.message}: ${errorMessage(error)}`);
        }
        event = this.queue.shift();
      }
    } finally {
      this.draining = null;
    }
  }

  private url(endpoint: string) {
    return `${this.baseUrl}/api/2.0/mlflow/${endpoint}`;
  }

  private async resolveExperimentId(): Promise<string> {
    if (this.experimentId) return this.experimentId;

    const name = this.options.experimentName;
    const found = await this.http.get(this.url('experiments/get-by-name'), {
      params: { experiment_name: name },
      validateStatus: (status) => status === 200 || status === 404,
    });

    const existing = GetExperimentResponse.safeParse(found.data);
    if (found.status === 200 && existing.success) {
      this.experimentId = existing.data.experiment.experiment_id;
    } else {
      const created = await this.http.post(this.url('experiments/create'), { name });
      this.experimentId = CreateExperimentResponse.parse(created.data).experiment_id;
    }

    return this.experimentId;
  }

  private async logRun(payload: RunPayload, startTime: number) {
    const experimentId = await this.resolveExperimentId();
    const runName = this.options.runNamePrefix
      ? `${this.options.runNamePrefix}-${payload.runName}`
      : payload.runName;

    const created = await this.http.post(this.url('runs/create'), {
      experiment_id: experimentId,
      run_name: runName,
      start_time: startTime,
      tags: [{ key: 'mlflow.runName', value: runName }],
    });
    const runId = CreateRunResponse.parse(created.data).run.info.run_id;

    await this.http.post(this.url('runs/log-batch'), {
      run_id: runId,
      metrics: Object.entries(payload.metrics).map(([key, value]) => ({
        key,
        value,
        timestamp: startTime,
        step: 0,
      })),
      params: Object.entries(payload.params).map(([key, value]) => ({ key, value })),
    });

    await this.http.post(this.url('runs/update'), {
      run_id: runId,
      status: 'FINISHED',
      end_time: Date.now(),
    });
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
