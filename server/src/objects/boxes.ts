import type { BoundingRegion, ObjectObservation } from '../perception/perception.types.js';

export const CONFIDENCE_FLOOR = 0.5;
export const NMS_IOU_THRESHOLD = 0.4;

export function area(region: BoundingRegion): number {
  return Math.max(0, region.width) * Math.max(0, region.height);
}

export function intersectionOverUnion(a: BoundingRegion, b: BoundingRegion): number {
  const left = Math.max(a.x, b.x);
  const top = Math.max(a.y, b.y);
  const right = Math.min(a.x + a.width, b.x + b.width);
  const bottom = Math.min(a.y + a.height, b.y + b.height);
  const intersection = Math.max(0, right - left) * Math.max(0, bottom - top);
  const union = area(a) + area(b) - intersection;
  return union > 0 ? intersection / union : 0;
}

/**
 * Greedy per-label non-max suppression. Boxes are visited by descending
 * confidence; a box is kept unless a kept box of the same label overlaps it by
 * more than `iouThreshold`. Survivors are returned in their input order.
 */
export function suppressOverlaps<T extends ObjectObservation>(
  detections: readonly T[],
  iouThreshold = NMS_IOU_THRESHOLD
): T[] {
  const byConfidence = detections
    .map((detection, index) => ({ detection, index }))
    .sort((a, b) => b.detection.confidence - a.detection.confidence);

  const kept: Array<{ detection: T; index: number }> = [];
  for (const candidate of byConfidence) {
    const overlaps = kept.some(
      (accepted) =>
        accepted.detection.label === candidate.detection.label &&
        intersectionOverUnion(accepted.detection.region, candidate.detection.region) > iouThreshold
    );
    if (!overlaps) kept.push(candidate);
  }

  return kept.sort((a, b) => a.index - b.index).map((entry) => entry.detection);
}

export function aboveFloor<T extends { confidence: number }>(detections: readonly T[], floor = CONFIDENCE_FLOOR): T[] {
  return detections.filter((detection) => detection.confidence >= floor);
}
