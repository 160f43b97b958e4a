/** Percentile with linear interpolation between closest ranks; NaN for no samples. */
export function percentile(samples: readonly number[], p: number): number {
  if (samples.length === 0) return Number.NaN;

  const sorted = [...samples].sort((a, b) => a - b);
  const rank = ((sorted.length - 1) * p) / 100;
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);

  return sorted[lower] + (sorted[upper] - sorted[lower]) * (rank - lower);
}

/** Images per second; NaN when no time elapsed. */
export function throughput(images: number, elapsedSeconds: number): number {
  if (elapsedSeconds <= 0) return Number.NaN;
  return images / elapsedSeconds;
}
