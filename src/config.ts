import fs from 'fs';
import { z } from 'zod';

import { ConfigError } from './lib/errors';
import { CLASSES } from './yolo/classes';

export const SERVICE_NAME = 'yolo-detect-service';
export const SERVICE_VERSION = '1.0.0';

const emptyToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const int = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const unit = (fallback: number) => z.coerce.number().min(0).max(1).default(fallback);

const booleanFlag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback ? 'true' : 'false')
    .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  HOST: z.string().default('0.0.0.0'),
  PORT: int(8000),
  MODEL_PATH: z.string().min(1).default('./models/yolo/model.json'),
  MODEL_INPUT_SIZE: int(320),
  CLASS_NAMES_PATH: z.preprocess(emptyToUndefined, z.string().optional()),
  IOU_THRESHOLD: unit(0.7),
  MAX_DETECTIONS: int(300),
  DEFAULT_CONF: unit(0.25),
  MAX_BATCH_SIZE: int(32),
  MAX_UPLOAD_BYTES: int(10 * 1024 * 1024),
  REQUEST_TIMEOUT_MS: int(30_000),
  API_WORKERS: int(1),
  EAGER_LOAD: booleanFlag(true),
  // an explicitly empty value turns the artifact log off
  ARTIFACT_DIR: z.string().default('artifacts'),
  MLFLOW_TRACKING_URI: z.preprocess(emptyToUndefined, z.string().url().optional()),
  MLFLOW_EXPERIMENT_NAME: z.string().min(1).default('default'),
  MLFLOW_RUN_NAME_PREFIX: z.preprocess(emptyToUndefined, z.string().optional()),
  TRACKING_QUEUE_SIZE: int(10_000),
  TRACKING_TIMEOUT_MS: int(5_000),
});

export interface AppConfig {
  host: string;
  port: number;
  model: {
    path: string;
    inputSize: number;
    classNames: readonly string[];
    iouThreshold: number;
    maxDetections: number;
  };
  defaultConfidence: number;
  maxBatchSize: number;
  maxUploadBytes: number;
  requestTimeoutMs: number;
  workers: number;
  eagerLoad: boolean;
  artifactDir: string | undefined;
  tracking: {
    uri: string | undefined;
    experimentName: string;
    runNamePrefix: string | undefined;
    queueSize: number;
    timeoutMs: number;
  };
}

const ClassNamesSchema = z.array(z.string().min(1)).min(1);

function readClassNames(file: string): string[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (error) {
    throw new ConfigError(`CLASS_NAMES_PATH: cannot read ${file}: ${String(error)}`);
  }

  const result = ClassNamesSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(`CLASS_NAMES_PATH: ${file} must hold a non-empty array of strings`);
  }
  return result.data;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid configuration\n  ${problems.join('\n  ')}`);
  }

  const vars = result.data;

  return {
    host: vars.HOST,
    port: vars.PORT,
    model: {
      path: vars.MODEL_PATH,
      inputSize: vars.MODEL_INPUT_SIZE,
      classNames: vars.CLASS_NAMES_PATH ? readClassNames(vars.CLASS_NAMES_PATH) : CLASSES,
      iouThreshold: vars.IOU_THRESHOLD,
      maxDetections: vars.MAX_DETECTIONS,
    },
    defaultConfidence: vars.DEFAULT_CONF,
    maxBatchSize: vars.MAX_BATCH_SIZE,
    maxUploadBytes: vars.MAX_UPLOAD_BYTES,
    requestTimeoutMs: vars.REQUEST_TIMEOUT_MS,
    workers: vars.API_WORKERS,
    eagerLoad: vars.EAGER_LOAD,
    artifactDir: vars.ARTIFACT_DIR.trim() === '' ? undefined : vars.ARTIFACT_DIR,
    tracking: {
      uri: vars.MLFLOW_TRACKING_URI,
      experimentName: vars.MLFLOW_EXPERIMENT_NAME,
      runNamePrefix: vars.MLFLOW_RUN_NAME_PREFIX,
      queueSize: vars.TRACKING_QUEUE_SIZE,
      timeoutMs: vars.TRACKING_TIMEOUT_MS,
    },
  };
}
