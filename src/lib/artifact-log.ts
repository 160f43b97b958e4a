import fs from 'fs/promises';
import path from 'path';
import { Mutex } from 'es-toolkit';

import type { DetectionJson } from './schemas';

export interface ArtifactRecord {
  timestamp: string;
  endpoint: 'predict' | 'predict_batch';
  file: string;
  conf: number;
  n_boxes: number;
  class_counts: Record<string, number>;
  latency_ms: number;
  detections: DetectionJson[];
}

/**
 * Append-only JSON-lines log, one record per completed prediction.
 * Appends are serialized so concurrent requests never interleave lines.
 */
export class ArtifactLog {
  readonly file: string;
  private mutex = new Mutex();
  private dirReady: Promise<string | undefined> | null = null;

  constructor(dir: string, fileName = 'predictions.jsonl') {
    this.file = path.join(dir, fileName);
  }

  async append(record: ArtifactRecord): Promise<void> {
    await this.mutex.acquire();
    try {
      this.dirReady ??= fs.mkdir(path.dirname(this.file), { recursive: true });
      await this.dirReady;
      await fs.appendFile(this.file, `${JSON.stringify(record)}\n`, 'utf8');
    } catch (error) {
      this.dirReady = null;
      throw error;
    } finally {
      this.mutex.release();
    }
  }
}
