import type { PriorityTier } from '../facts/facts.js';

const TIERED_LABELS: ReadonlyArray<readonly [PriorityTier, readonly string[]]> = [
  ['high', ['person', 'car', 'truck', 'bus', 'motorcycle', 'bicycle', 'traffic light', 'stop sign', 'door']],
  ['medium', ['chair', 'table', 'dining table', 'stairs', 'bed', 'couch', 'bench']],
  ['low', ['cup', 'bottle', 'book', 'cell phone', 'laptop', 'remote']]
];

const TIER_BY_LABEL = new Map<string, PriorityTier>(
  TIERED_LABELS.flatMap(([tier, labels]) => labels.map((label) => [label, tier] as const))
);

export function tierFor(label: string): PriorityTier {
  return TIER_BY_LABEL.get(label.trim().toLowerCase()) ?? 'normal';
}
