import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ArtifactLog, type ArtifactRecord } from './artifact-log';

const record = (file: string): ArtifactRecord => ({
  timestamp: '2026-01-01T00:00:00.000Z',
  endpoint: 'predict',
  file,
  conf: 0.25,
  n_boxes: 1,
  class_counts: { Stop: 1 },
  latency_ms: 4.2,
  detections: [{ box: [1, 2, 3, 4], class: 'Stop', score: 0.9 }],
});

describe('ArtifactLog', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'artifacts-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('creates the directory and writes one JSON line per record', async () => {
    const log = new ArtifactLog(path.join(dir, 'nested'));

    await log.append(record('a.jpg'));
    await log.append(record('b.jpg'));

    const lines = (await fs.readFile(log.file, 'utf8')).trimEnd().split('\n');
    expect(lines.map((line) => JSON.parse(line).file)).toEqual(['a.jpg', 'b.jpg']);
  });

  it('keeps lines intact under concurrent appends', async () => {
    const log = new ArtifactLog(dir);
    const files = Array.from({ length: 25 }, (_, i) => `img_${i}.jpg`);

    await Promise.all(files.map((file) => log.append(record(file))));

    const lines = (await fs.readFile(log.file, 'utf8')).trimEnd().split('\n');
    expect(lines).toHaveLength(25);
    expect(lines.map((line) => JSON.parse(line).file).sort()).toEqual([...files].sort());
  });
});
