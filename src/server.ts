import compression from 'compression';
import cors from 'cors';
import express, { type ErrorRequestHandler, type RequestHandler } from 'express';
import multer from 'multer';
import { TimeoutError, round, withTimeout } from 'es-toolkit';

import { type AppConfig, SERVICE_NAME, SERVICE_VERSION } from './config';
import type { ArtifactLog } from './lib/artifact-log';
import {
  BatchTooLargeError,
  InferenceError,
  LoadError,
  PayloadTooLargeError,
  RequestTimeoutError,
  ServiceError,
  ValidationError,
} from './lib/errors';
import type { PredictionEndpoint, ServiceMetrics } from './lib/metrics';
import type { ModelLifecycle } from './lib/model-lifecycle';
import {
  type PredictionResult,
  predictImage,
  toBatchItem,
  toPredictionResponse,
} from './lib/prediction';
import {
  type BatchResponse,
  type ErrorResponse,
  type HealthResponse,
  type InfoResponse,
  PredictQuerySchema,
  type PredictionResponse,
  type WarmupResponse,
  parseRequest,
} from './lib/schemas';
import type { TrackingClient } from './lib/tracking-client';

export interface AppDeps {
  config: Pick<
    AppConfig,
    | 'defaultConfidence'
    | 'maxBatchSize'
    | 'maxUploadBytes'
    | 'requestTimeoutMs'
    | 'workers'
    | 'model'
  >;
  model: ModelLifecycle;
  tracker: TrackingClient;
  metrics: ServiceMetrics;
  artifacts?: ArtifactLog;
}

const ACCEPTED_CONTENT_TYPE = /^(image\/|application\/octet-stream)/;

// express 4 does not forward rejected promises to the error handler
const asyncHandler =
  (handler: (...args: Parameters<RequestHandler>) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    handler(req, res, next).catch(next);
  };

export function createApp({ config, model, tracker, metrics, artifacts }: AppDeps) {
  const app = express();

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.maxUploadBytes, files: config.maxBatchSize },
  });

  app.disable('x-powered-by');
  app.use(metrics.middleware());
  app.use(cors());
  app.use(compression({ threshold: 500 }));

  const confidenceOf = (query: unknown) =>
    parseRequest(PredictQuerySchema, query).conf ?? config.defaultConfidence;

  function checkUpload(file: Express.Multer.File) {
    if (!ACCEPTED_CONTENT_TYPE.test(file.mimetype)) {
      throw new ValidationError(`${file.originalname || 'upload'} is not an image upload`);
    }
  }

  // the signal aborts once the caller has been answered with a timeout
  async function runTimed<T>(work: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    try {
      return await withTimeout(() => work(controller.signal), config.requestTimeoutMs);
    } catch (error) {
      if (!(error instanceof TimeoutError)) throw error;

      controller.abort();
      throw new RequestTimeoutError(config.requestTimeoutMs);
    }
  }

  async function writeArtifact(
    endpoint: PredictionEndpoint,
    file: string,
    confidence: number,
    result: PredictionResult,
  ) {
    if (!artifacts) return;

    const body = toPredictionResponse(file, confidence, result);
    try {
      await artifacts.append({
        timestamp: new Date().toISOString(),
        endpoint,
        file,
        conf: confidence,
        n_boxes: body.n_boxes,
        class_counts: body.class_counts,
        latency_ms: body.latency_ms,
        detections: body.detections,
      });
    } catch (error) {
      console.error('artifact log write failed', error);
    }
  }

  app.get('/healthz', (_req, res) => {
    const body: HealthResponse = { status: model.ready ? 'ok' : 'starting', ready: model.ready };
    res.json(body);
  });

  app.get('/info', (_req, res) => {
    const body: InfoResponse = {
      name: SERVICE_NAME,
      version: SERVICE_VERSION,
      workers: config.workers,
    };
    res.json(body);
  });

  app.post(
    '/warmup',
    asyncHandler(async (_req, res) => {
      try {
        await model.warmup();
        const body: WarmupResponse = { ready: true };
        res.json(body);
      } catch (error) {
        if (!(error instanceof LoadError)) throw error;

        console.error('warmup failed', error);
        const body: WarmupResponse = {
          ready: false,
          error: 'model_load_failed',
          detail: error.message,
        };
        res.status(503).json(body);
      }
    }),
  );

  app.post(
    '/predict',
    parseUpload(upload.single('file')),
    asyncHandler(async (req, res) => {
      const confidence = confidenceOf(req.query);
      const detector = model.current();

      const file = req.file;
      if (!file) {
        throw new ValidationError('Expected one image in multipart field "file"');
      }
      checkUpload(file);

      let result: PredictionResult;
      try {
        result = await runTimed(() => predictImage(detector, file.buffer, confidence));
      } catch (error) {
        if (error instanceof ServiceError) metrics.observeError(error.code);
        throw error;
      }

      metrics.observePrediction('predict', result.latencyMs, result.nBoxes);
      await writeArtifact('predict', file.originalname, confidence, result);
      tracker.record({
        kind: 'single',
        timestamp: Date.now(),
        confidence,
        latencyMs: result.latencyMs,
        nBoxes: result.nBoxes,
        classCounts: result.classCounts,
      });

      const body: PredictionResponse = toPredictionResponse(file.originalname, confidence, result);
      res.json(body);
    }),
  );

  app.post(
    '/predict_batch',
    parseUpload(upload.array('files')),
    asyncHandler(async (req, res) => {
      const confidence = confidenceOf(req.query);
      const detector = model.current();

      const files = Array.isArray(req.files) ? req.files : [];
      if (files.length === 0) {
        throw new ValidationError('Expected at least one image in multipart field "files"');
      }
      if (files.length > config.maxBatchSize) {
        throw new BatchTooLargeError(config.maxBatchSize);
      }

      const started = performance.now();

      const work = async (signal: AbortSignal) => {
        const settled: (PredictionResult | ServiceError)[] = [];

        for (const file of files) {
          if (signal.aborted) break;
          try {
            checkUpload(file);
            const result = await predictImage(detector, file.buffer, confidence);
            if (signal.aborted) break;

            metrics.observePrediction('predict_batch', result.latencyMs, result.nBoxes);
            await writeArtifact('predict_batch', file.originalname, confidence, result);
            settled.push(result);
          } catch (error) {
            if (signal.aborted) break;

            const failure =
              error instanceof ServiceError ? error : new InferenceError({ cause: error });
            if (failure.status >= 500) {
              console.error(`${file.originalname}: ${failure.code}`, failure.cause ?? failure);
            }
            metrics.observeError(failure.code);
            settled.push(failure);
          }
        }

        return settled;
      };

      let outcomes: (PredictionResult | ServiceError)[];
      try {
        outcomes = await runTimed(work);
      } catch (error) {
        if (error instanceof ServiceError) metrics.observeError(error.code);
        throw error;
      }

      const batchLatencyMs = performance.now() - started;
      const avgLatencyMs = batchLatencyMs / Math.max(1, files.length);

      const succeeded = outcomes.filter(
        (outcome): outcome is PredictionResult => !(outcome instanceof ServiceError),
      );
      const classCounts: Record<string, number> = {};
      for (const result of succeeded) {
        for (const [label, count] of Object.entries(result.classCounts)) {
          classCounts[label] = (classCounts[label] ?? 0) + count;
        }
      }

      tracker.record({
        kind: 'batch',
        timestamp: Date.now(),
        confidence,
        latencyMs: batchLatencyMs,
        avgLatencyMs,
        batchSize: files.length,
        nBoxes: succeeded.reduce((sum, result) => sum + result.nBoxes, 0),
        classCounts,
      });

      const body: BatchResponse = {
        batch_size: files.length,
        conf_threshold: confidence,
        results: outcomes.map((outcome, i) => toBatchItem(files[i].originalname, outcome)),
        avg_latency_ms: round(avgLatencyMs, 2),
        batch_latency_ms: round(batchLatencyMs, 2),
      };
      res.json(body);
    }),
  );

  app.get(
    '/metrics',
    asyncHandler(async (_req, res) => {
      const { contentType, body } = await metrics.render();
      res.set('Content-Type', contentType).send(body);
    }),
  );

  app.use((_req, res) => {
    const body: ErrorResponse = { error: 'not_found', detail: 'No such route' };
    res.status(404).json(body);
  });

  app.use(errorHandler(config.maxBatchSize, config.maxUploadBytes));

  return app;
}

// busboy reports a malformed body as a plain Error; only multer's own errors carry a code
function parseUpload(middleware: RequestHandler): RequestHandler {
  return (req, res, next) => {
    middleware(req, res, (error?: unknown) => {
      if (error === undefined || error instanceof multer.MulterError) {
        next(error);
        return;
      }

      const message = error instanceof Error ? error.message : String(error);
      next(new ValidationError(`Malformed multipart body: ${message}`, { cause: error }));
    });
  };
}

function toServiceError(error: unknown, maxBatchSize: number, maxUploadBytes: number) {
  if (error instanceof ServiceError) return error;

  if (error instanceof multer.MulterError) {
    switch (error.code) {
      case 'LIMIT_FILE_COUNT':
        return new BatchTooLargeError(maxBatchSize);
      case 'LIMIT_FILE_SIZE':
        return new PayloadTooLargeError(`Each image may be at most ${maxUploadBytes} bytes`);
      case 'LIMIT_UNEXPECTED_FILE':
        return new ValidationError(`Unexpected multipart field "${error.field ?? ''}"`);
      default:
        return new ValidationError(error.message);
    }
  }

  return null;
}

function errorHandler(maxBatchSize: number, maxUploadBytes: number): ErrorRequestHandler {
  return (error: unknown, _req, res, next) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    const known = toServiceError(error, maxBatchSize, maxUploadBytes);
    if (!known) {
      console.error('unhandled request error', error);
      const body: ErrorResponse = { error: 'internal_error', detail: 'Internal server error' };
      res.status(500).json(body);
      return;
    }

    if (known.status >= 500) {
      console.error(`${known.code}:`, known.cause ?? known);
    }

    const body: ErrorResponse = { error: known.code, detail: known.message };
    res.status(known.status).json(body);
  };
}
