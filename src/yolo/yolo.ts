import * as tf from '@tensorflow/tfjs';

import { InferenceError, LoadError } from '../lib/errors';
import { nonMaxSuppression } from '../lib/nms';
import type { Box, Detection, Detector, RawImage } from '../lib/type';
import { CLASSES, className } from './classes';
import { fileSystemHandler } from './file-system-handler';

export interface YoloConfig {
  modelPath: string;
  inputSize: number;
  classNames?: readonly string[];
  iouThreshold?: number;
  maxDetections?: number;
}

/** The part of a tfjs `GraphModel` the detector uses. */
export interface InferenceModel {
  execute(inputs: tf.Tensor): tf.Tensor | tf.Tensor[];
  dispose(): void;
}

export async function loadYolo(config: YoloConfig): Promise<YoloDetector> {
  await tf.ready();

  let model: tf.GraphModel;
  try {
    model = await tf.loadGraphModel(fileSystemHandler(config.modelPath));
  } catch (error) {
    throw new LoadError(`Failed to load model from ${config.modelPath}`, { cause: error });
  }

  const detector = new YoloDetector(model, config);
  try {
    detector.warmup();
  } catch (error) {
    detector.dispose();
    throw new LoadError(`Model at ${config.modelPath} failed its first inference`, {
      cause: error,
    });
  }

  console.log('Current backend:', tf.getBackend());
  console.log('Memory info:', tf.memory());

  return detector;
}

export class YoloDetector implements Detector {
  private model: InferenceModel | null;
  private inputSize: number;
  private classNames: readonly string[];
  private iouThreshold: number;
  private maxDetections: number;

  constructor(model: InferenceModel, config: Omit<YoloConfig, 'modelPath'>) {
    this.model = model;
    this.inputSize = config.inputSize;
    this.classNames = config.classNames ?? CLASSES;
    this.iouThreshold = config.iouThreshold ?? 0.7;
    this.maxDetections = config.maxDetections ?? 300;
  }

  /** Runs one blank frame through the graph so the first request does not pay for kernel setup. */
  warmup() {
    const size = this.inputSize;
    this.detect({ data: new Uint8Array(size * size * 3), width: size, height: size }, 1);
  }

  detect(image: RawImage, confidence: number): Detection[] {
    const model = this.model;
    if (!model) {
      throw new InferenceError({ cause: new Error('Model has been disposed') });
    }

    const input = this.preprocessImage(image);
    let outputs: tf.Tensor[] = [];
    try {
      const prediction = model.execute(input);
      outputs = Array.isArray(prediction) ? prediction : [prediction];

      return this.postprocess(outputs[0], image.width, image.height, confidence);
    } catch (error) {
      throw new InferenceError({ cause: error });
    } finally {
      input.dispose();
      outputs.forEach((tensor) => tensor.dispose());
    }
  }

  private preprocessImage(image: RawImage): tf.Tensor4D {
    return tf.tidy(() => {
      const pixels = tf.tensor3d(image.data, [image.height, image.width, 3], 'int32');

      const resized = tf.image.resizeBilinear(pixels, [this.inputSize, this.inputSize]);
      const normalized = tf.div(resized, 255.0);

      return tf.expandDims<tf.Tensor4D>(normalized, 0);
    });
  }

  private postprocess(
    output: tf.Tensor | undefined,
    originalWidth: number,
    originalHeight: number,
    minScore: number,
  ): Detection[] {
    if (!output || output.rank !== 3) {
      throw new Error(`Unexpected model output shape ${JSON.stringify(output?.shape)}`);
    }

    const data = output.dataSync();
    const [, dim1, dim2] = output.shape;
    const channels = 4 + this.classNames.length;

    // [1, 4 + classes, boxes] is the exported layout; some exports are transposed
    const transposed = dim2 === channels && dim1 !== channels;
    const numChannels = transposed ? dim2 : dim1;
    const numBoxes = transposed ? dim1 : dim2;
    const at = transposed
      ? (channel: number, box: number) => data[box * numChannels + channel]
      : (channel: number, box: number) => data[channel * numBoxes + box];

    const scaleX = originalWidth / this.inputSize;
    const scaleY = originalHeight / this.inputSize;
    const candidates: Detection[] = [];

    for (let i = 0; i < numBoxes; i++) {
      let maxScore = 0;
      let maxClassId = 0;

      for (let j = 4; j < numChannels; j++) {
        const score = at(j, i);
        if (score > maxScore) {
          maxScore = score;
          maxClassId = j - 4;
        }
      }

      if (maxScore < minScore) continue;

      const cx = at(0, i);
      const cy = at(1, i);
      const w = at(2, i);
      const h = at(3, i);

      const box: Box = [
        clamp((cx - w / 2) * scaleX, originalWidth),
        clamp((cy - h / 2) * scaleY, originalHeight),
        clamp((cx + w / 2) * scaleX, originalWidth),
        clamp((cy + h / 2) * scaleY, originalHeight),
      ];

      candidates.push({
        box,
        label: className(this.classNames, maxClassId),
        score: maxScore,
      });
    }

    return nonMaxSuppression(candidates, this.iouThreshold).slice(0, this.maxDetections);
  }

  dispose() {
    if (this.model) {
      this.model.dispose();
      this.model = null;
    }
  }
}

function clamp(value: number, upper: number): number {
  return Math.min(Math.max(value, 0), upper);
}
