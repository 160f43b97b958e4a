import type { Box, Detection } from './type';

export function calculateIoU(box1: Box, box2: Box): number {
  const [x1_1, y1_1, x2_1, y2_1] = box1;
  const [x1_2, y1_2, x2_2, y2_2] = box2;

  const intersectionArea =
    Math.max(0, Math.min(x2_1, x2_2) - Math.max(x1_1, x1_2)) *
    Math.max(0, Math.min(y2_1, y2_2) - Math.max(y1_1, y1_2));

  const box1Area = (x2_1 - x1_1) * (y2_1 - y1_1);
  const box2Area = (x2_2 - x1_2) * (y2_2 - y1_2);
  const unionArea = box1Area + box2Area - intersectionArea;

  return unionArea > 0 ? intersectionArea / unionArea : 0;
}

/**
 * Greedy non-max suppression, applied separately per label.
 * Returns the kept detections ordered by descending score.
 */
export function nonMaxSuppression(detections: Detection[], iouThreshold: number): Detection[] {
  if (detections.length === 0) return [];

  const sorted = [...detections].sort((a, b) => b.score - a.score);
  const kept: Detection[] = [];
  const suppressed = new Set<number>();

  for (let i = 0; i < sorted.length; i++) {
    if (suppressed.has(i)) continue;

    const current = sorted[i];
    kept.push(current);

    for (let j = i + 1; j < sorted.length; j++) {
      if (suppressed.has(j)) continue;

      const other = sorted[j];
      if (other.label !== current.label) continue;

      if (calculateIoU(current.box, other.box) > iouThreshold) {
        suppressed.add(j);
      }
    }
  }

  return kept;
}
