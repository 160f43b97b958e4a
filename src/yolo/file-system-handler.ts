import fs from 'fs/promises';
import path from 'path';
import * as tf from '@tensorflow/tfjs';

/**
 * Reads a tfjs graph model (`model.json` plus its weight shards) from local disk.
 * The pure-JS runtime has no file-system loader of its own.
 */
export function fileSystemHandler(modelJsonPath: string): tf.io.IOHandler {
  const baseDir = path.dirname(modelJsonPath);

  return {
    load: async () => {
      const modelJSON: tf.io.ModelJSON = JSON.parse(await fs.readFile(modelJsonPath, 'utf8'));

      return tf.io.getModelArtifactsForJSON(modelJSON, async (weightsManifest) => {
        const weightSpecs: tf.io.WeightsManifestEntry[] = [];
        const shards: Uint8Array[] = [];

        for (const group of weightsManifest) {
          weightSpecs.push(...group.weights);
          for (const shardPath of group.paths) {
            shards.push(await fs.readFile(path.join(baseDir, shardPath)));
          }
        }

        return [weightSpecs, concatShards(shards)];
      });
    },
  };
}

function concatShards(shards: Uint8Array[]): ArrayBuffer {
  const total = shards.reduce((sum, shard) => sum + shard.byteLength, 0);
  const weightData = new ArrayBuffer(total);
  const view = new Uint8Array(weightData);

  let offset = 0;
  for (const shard of shards) {
    view.set(shard, offset);
    offset += shard.byteLength;
  }

  return weightData;
}
