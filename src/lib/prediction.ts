import { countBy, round } from 'es-toolkit';

import { InferenceError, ServiceError } from './errors';
import { decodeImage } from './decode-image';
import type { BatchItem, DetectionJson, PredictionResponse } from './schemas';
import type { Detection, Detector } from './type';

export interface PredictionResult {
  detections: Detection[];
  nBoxes: number;
  classCounts: Record<string, number>;
  latencyMs: number;
}

/** Decodes one upload and runs the detector on it, timing the model call only. */
export async function predictImage(
  detector: Detector,
  buffer: Buffer,
  confidence: number,
): Promise<PredictionResult> {
  const image = await decodeImage(buffer);

  const start = performance.now();
  let detections: Detection[];
  try {
    detections = detector.detect(image, confidence);
  } catch (error) {
    throw error instanceof InferenceError ? error : new InferenceError({ cause: error });
  }
  const latencyMs = performance.now() - start;

  return {
    detections,
    nBoxes: detections.length,
    classCounts: countBy(detections, (detection) => detection.label),
    latencyMs,
  };
}

export const detectionToJson = (detection: Detection): DetectionJson => ({
  box: [
    Math.round(detection.box[0]),
    Math.round(detection.box[1]),
    Math.round(detection.box[2]),
    Math.round(detection.box[3]),
  ],
  class: detection.label,
  score: detection.score,
});

export const toPredictionResponse = (
  file: string,
  confidence: number,
  result: PredictionResult,
): PredictionResponse => ({
  file,
  conf_threshold: confidence,
  detections: result.detections.map(detectionToJson),
  n_boxes: result.nBoxes,
  class_counts: result.classCounts,
  latency_ms: round(result.latencyMs, 3),
});

export const toBatchItem = (file: string, outcome: PredictionResult | ServiceError): BatchItem =>
  outcome instanceof ServiceError
    ? { ok: false, file, error: outcome.code, detail: outcome.message }
    : {
        ok: true,
        file,
        detections: outcome.detections.map(detectionToJson),
        n_boxes: outcome.nBoxes,
        class_counts: outcome.classCounts,
        latency_ms: round(outcome.latencyMs, 3),
      };
