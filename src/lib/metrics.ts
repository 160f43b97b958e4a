import type { RequestHandler } from 'express';
import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

const LATENCY_BUCKETS_MS = [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000];

export type PredictionEndpoint = 'predict' | 'predict_batch';

/** Prometheus instruments for one app instance, on their own registry. */
export class ServiceMetrics {
  readonly registry = new Registry();

  readonly httpRequests = new Counter({
    name: 'detector_http_requests_total',
    help: 'HTTP requests by method, route and status code',
    labelNames: ['method', 'route', 'status'] as const,
    registers: [this.registry],
  });

  readonly httpDuration = new Histogram({
    name: 'detector_http_request_duration_ms',
    help: 'HTTP request duration in milliseconds',
    labelNames: ['route'] as const,
    buckets: LATENCY_BUCKETS_MS,
    registers: [this.registry],
  });

  readonly predictions = new Counter({
    name: 'detector_predictions_total',
    help: 'Images predicted successfully',
    labelNames: ['endpoint'] as const,
    registers: [this.registry],
  });

  readonly predictionErrors = new Counter({
    name: 'detector_prediction_errors_total',
    help: 'Images that failed, by error code',
    labelNames: ['reason'] as const,
    registers: [this.registry],
  });

  readonly inferenceLatency = new Histogram({
    name: 'detector_inference_latency_ms',
    help: 'Model call latency per image in milliseconds',
    buckets: LATENCY_BUCKETS_MS,
    registers: [this.registry],
  });

  readonly detections = new Counter({
    name: 'detector_detections_total',
    help: 'Boxes returned by the model',
    registers: [this.registry],
  });

  constructor(options: { collectDefault?: boolean } = {}) {
    if (options.collectDefault) {
      collectDefaultMetrics({ register: this.registry });
    }
  }

  observePrediction(endpoint: PredictionEndpoint, latencyMs: number, nBoxes: number) {
    this.predictions.inc({ endpoint });
    this.inferenceLatency.observe(latencyMs);
    this.detections.inc(nBoxes);
  }

  observeError(reason: string) {
    this.predictionErrors.inc({ reason });
  }

  middleware(): RequestHandler {
    return (req, res, next) => {
      const started = performance.now();

      res.on('finish', () => {
        const path: unknown = req.route?.path;
        const route = typeof path === 'string' ? path : 'unmatched';

        this.httpRequests.inc({ method: req.method, route, status: String(res.statusCode) });
        this.httpDuration.observe({ route }, performance.now() - started);
      });

      next();
    };
  }

  async render(): Promise<{ contentType: string; body: string }> {
    return { contentType: this.registry.contentType, body: await this.registry.metrics() };
  }
}
