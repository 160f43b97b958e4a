import fs from 'fs';
import path from 'path';
import { parseArgs } from 'util';
import sharp from 'sharp';
import { z } from 'zod';

import { DetectionApiClient, type UploadImage } from './api-client';
import { runBenchmark, summarize } from './runner';

const ArgsSchema = z.object({
  url: z.string().url(),
  mode: z.enum(['sequential', 'parallel', 'batch']),
  count: z.coerce.number().int().min(1),
  conf: z.coerce.number().min(0).max(1),
  concurrency: z.coerce.number().int().min(1).optional(),
  image: z.string().optional(),
  warmup: z.boolean(),
});

const USAGE = `Usage: bench [--url URL] [--mode sequential|parallel|batch] [--count N]
             [--conf 0..1] [--concurrency N] [--image FILE] [--warmup]`;

// flat light-gray frame, sent when no image is given
async function placeholderImage(): Promise<UploadImage> {
  const data = await sharp({
    create: { width: 320, height: 320, channels: 3, background: { r: 220, g: 220, b: 220 } },
  })
    .jpeg({ quality: 85 })
    .toBuffer();
  return { data, filename: 'placeholder.jpg' };
}

async function main() {
  const { values } = parseArgs({
    options: {
      url: { type: 'string', default: process.env.API_URL ?? 'http://localhost:8000' },
      mode: { type: 'string', default: 'sequential' },
      count: { type: 'string', default: '5' },
      conf: { type: 'string', default: process.env.DEFAULT_CONF ?? '0.25' },
      concurrency: { type: 'string' },
      image: { type: 'string' },
      warmup: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return;
  }

  const parsed = ArgsSchema.safeParse(values);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `--${issue.path.join('.')}: ${issue.message}`,
    );
    console.error(problems.join('\n'));
    console.error(USAGE);
    process.exitCode = 2;
    return;
  }
  const args = parsed.data;

  const client = new DetectionApiClient(args.url);

  const health = await client.healthz();
  console.log(`API ${args.url}: ${health.status}`);

  if (args.warmup || !health.ready) {
    const warm = await client.warmup();
    console.log(warm.ready ? 'Warmup OK: model loaded' : `Warmup failed: ${warm.detail ?? ''}`);
  }

  const info = await client.info();
  console.log(`Detected API workers: ${info.workers}`);

  const image: UploadImage = args.image
    ? {
        data: fs.readFileSync(args.image),
        filename: path.basename(args.image),
        contentType: path.extname(args.image).toLowerCase() === '.png' ? 'image/png' : 'image/jpeg',
      }
    : await placeholderImage();
  const images = Array.from({ length: args.count }, () => image);

  const report = await runBenchmark(client, images, {
    mode: args.mode,
    conf: args.conf,
    concurrency: args.concurrency ?? Math.max(4, info.workers),
  });

  console.table([summarize(report)]);
  if (report.failures.length > 0) {
    console.log(`First failure: ${report.failures[0]}`);
  }
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
