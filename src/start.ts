import cluster from 'cluster';
import http from 'http';

import { type AppConfig, loadConfig } from './config';
import { ArtifactLog } from './lib/artifact-log';
import { ServiceMetrics } from './lib/metrics';
import { ModelLifecycle } from './lib/model-lifecycle';
import { TrackingClient } from './lib/tracking-client';
import { createApp } from './server';
import { loadYolo } from './yolo/yolo';

const SHUTDOWN_GRACE_MS = 10_000;

function startPrimary(config: AppConfig) {
  console.log(`Primary ${process.pid} starting ${config.workers} workers`);

  for (let i = 0; i < config.workers; i++) {
    cluster.fork();
  }

  cluster.on('exit', (worker, code, signal) => {
    console.error(`Worker ${worker.process.pid} exited (${signal ?? code})`);
  });
}

async function startWorker(config: AppConfig) {
  const model = new ModelLifecycle(() =>
    loadYolo({
      modelPath: config.model.path,
      inputSize: config.model.inputSize,
      classNames: config.model.classNames,
      iouThreshold: config.model.iouThreshold,
      maxDetections: config.model.maxDetections,
    }),
  );

  const tracker = new TrackingClient({
    trackingUri: config.tracking.uri,
    experimentName: config.tracking.experimentName,
    runNamePrefix: config.tracking.runNamePrefix,
    maxQueueSize: config.tracking.queueSize,
    timeoutMs: config.tracking.timeoutMs,
    params: {
      imgsz: String(config.model.inputSize),
      api_workers: String(config.workers),
    },
  });

  const app = createApp({
    config,
    model,
    tracker,
    metrics: new ServiceMetrics({ collectDefault: true }),
    artifacts: config.artifactDir ? new ArtifactLog(config.artifactDir) : undefined,
  });

  const server = http.createServer(app);
  server.requestTimeout = config.requestTimeoutMs * 2;

  await new Promise<void>((resolve) => server.listen(config.port, config.host, resolve));
  console.log(`Listening on http://${config.host}:${config.port} (pid ${process.pid})`);
  if (!tracker.enabled) {
    console.log('MLFLOW_TRACKING_URI is not set, run tracking is off');
  }

  const shutdown = async (signal: string) => {
    console.log(`${signal} received, shutting down`);

    await new Promise<void>((resolve) => server.close(() => resolve()));
    await Promise.race([
      tracker.flush(),
      new Promise((resolve) => setTimeout(resolve, SHUTDOWN_GRACE_MS).unref()),
    ]);
    model.dispose();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).then(
        () => process.exit(0),
        (error) => {
          console.error('Shutdown failed:', error);
          process.exit(1);
        },
      );
    });
  }

  if (config.eagerLoad) {
    try {
      await model.warmup();
    } catch (error) {
      // the service keeps running; POST /warmup can retry
      console.error('Eager model load failed:', error);
    }
  }
}

async function main() {
  const config = loadConfig();

  if (config.workers > 1 && cluster.isPrimary) {
    startPrimary(config);
    return;
  }

  await startWorker(config);
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
