import { z } from 'zod';

import { ValidationError } from './errors';

// -------- requests --------

const ConfidenceParam = z
  .string({ invalid_type_error: 'conf must be given once, as a number' })
  .trim()
  .min(1, 'conf must not be empty')
  .pipe(
    z.coerce
      .number({ invalid_type_error: 'conf must be a number' })
      .min(0, 'conf must be between 0 and 1')
      .max(1, 'conf must be between 0 and 1'),
  );

export const PredictQuerySchema = z.object({
  conf: ConfidenceParam.optional(),
});

export type PredictQuery = z.infer<typeof PredictQuerySchema>;

export function parseRequest<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const message = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ` : '') + issue.message)
      .join('; ');
    throw new ValidationError(message);
  }
  return result.data;
}

// -------- responses --------

export const DetectionSchema = z.object({
  box: z.tuple([z.number(), z.number(), z.number(), z.number()]),
  class: z.string(),
  score: z.number().min(0).max(1),
});

const PredictionFields = {
  file: z.string(),
  detections: z.array(DetectionSchema),
  n_boxes: z.number().int().nonnegative(),
  class_counts: z.record(z.number().int().nonnegative()),
  latency_ms: z.number().nonnegative(),
};

export const PredictionResponseSchema = z.object({
  ...PredictionFields,
  conf_threshold: z.number().min(0).max(1),
});

export const BatchItemSchema = z.discriminatedUnion('ok', [
  z.object({ ok: z.literal(true), ...PredictionFields }),
  z.object({ ok: z.literal(false), file: z.string(), error: z.string(), detail: z.string() }),
]);

export const BatchResponseSchema = z.object({
  batch_size: z.number().int().nonnegative(),
  conf_threshold: z.number().min(0).max(1),
  results: z.array(BatchItemSchema),
  avg_latency_ms: z.number().nonnegative(),
  batch_latency_ms: z.number().nonnegative(),
});

export const HealthResponseSchema = z.object({
  status: z.enum(['ok', 'starting']),
  ready: z.boolean(),
});

export const WarmupResponseSchema = z.object({
  ready: z.boolean(),
  error: z.string().optional(),
  detail: z.string().optional(),
});

export const InfoResponseSchema = z.object({
  name: z.string(),
  version: z.string(),
  workers: z.number().int().positive(),
});

export const ErrorResponseSchema = z.object({
  error: z.string(),
  detail: z.string(),
});

export type DetectionJson = z.infer<typeof DetectionSchema>;
export type PredictionResponse = z.infer<typeof PredictionResponseSchema>;
export type BatchItem = z.infer<typeof BatchItemSchema>;
export type BatchResponse = z.infer<typeof BatchResponseSchema>;
export type HealthResponse = z.infer<typeof HealthResponseSchema>;
export type WarmupResponse = z.infer<typeof WarmupResponseSchema>;
export type InfoResponse = z.infer<typeof InfoResponseSchema>;
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
