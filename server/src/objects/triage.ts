import { composeUtterance, compareTiers, sortFacts, type Fact, type PriorityTier } from '../facts/facts.js';
import { toObjectRecord, type DetectionRecord, type ObjectObservation } from '../perception/perception.types.js';
import { aboveFloor, CONFIDENCE_FLOOR, NMS_IOU_THRESHOLD, suppressOverlaps } from './boxes.js';
import { tierFor } from './priority.js';
import { locate, type SpatialDescription } from './spatial.js';

export type TriagedObject = ObjectObservation & {
  tier: PriorityTier;
  location: SpatialDescription;
};

export type TrackedSighting = {
  at: number;
  record: DetectionRecord<ObjectObservation>;
};

export type TrackedObject = {
  label: string;
  tier: PriorityTier;
  history: TrackedSighting[];
};

export type ObjectTriageOptions = {
  confidenceFloor?: number;
  iouThreshold?: number;
  retentionMs?: number;
};

export class ObjectTriage {
  private readonly confidenceFloor: number;
  private readonly iouThreshold: number;
  private readonly retentionMs: number;
  private readonly tracking = new Map<string, TrackedObject>();

  constructor(options: ObjectTriageOptions = {}) {
    this.confidenceFloor = options.confidenceFloor ?? CONFIDENCE_FLOOR;
    this.iouThreshold = options.iouThreshold ?? NMS_IOU_THRESHOLD;
    this.retentionMs = options.retentionMs ?? 5000;
  }

  process(
    detections: readonly ObjectObservation[],
    frame: { width: number; height: number },
    now: number
  ): TriagedObject[] {
    const survivors = suppressOverlaps(aboveFloor(detections, this.confidenceFloor), this.iouThreshold);
    const triaged = survivors.map((detection) => ({
      ...detection,
      tier: tierFor(detection.label),
      location: locate(detection.region, frame.width, frame.height)
    }));
    this.updateTracking(triaged, now);
    return triaged;
  }

  updateTracking(objects: readonly TriagedObject[], now: number): void {
    for (const object of objects) {
      const entry = this.tracking.get(object.label) ?? { label: object.label, tier: object.tier, history: [] };
      entry.history.push({ at: now, record: toObjectRecord(object) });
      this.tracking.set(object.label, entry);
    }

    const cutoff = now - this.retentionMs;
    for (const [label, entry] of this.tracking) {
      entry.history = entry.history.filter((sighting) => sighting.at > cutoff);
      if (entry.history.length === 0) {
        this.tracking.delete(label);
      }
    }
  }

  // Read-only view: applies the retention window without purging.
  tracked(now: number): TrackedObject[] {
    const cutoff = now - this.retentionMs;
    const result: TrackedObject[] = [];
    for (const entry of this.tracking.values()) {
      const history = entry.history.filter((sighting) => sighting.at > cutoff);
      if (history.length > 0) {
        result.push({ label: entry.label, tier: entry.tier, history });
      }
    }
    return result;
  }

  isTracking(label: string, now: number): boolean {
    return this.tracked(now).some((entry) => entry.label === label);
  }

  lastSeen(label: string): number | null {
    const history = this.tracking.get(label)?.history;
    const last = history?.[history.length - 1];
    return last ? last.at : null;
  }
}

/**
 * High-tier objects become one "Important" fact; everything else is grouped into
 * a single "Also seen" fact ordered by tier, detection order within a tier.
 */
export function objectFacts(objects: readonly TriagedObject[]): Fact[] {
  const facts: Fact[] = [];
  const important = objects.filter((object) => object.tier === 'high');
  const others = sortFacts(objects.filter((object) => object.tier !== 'high'));

  if (important.length > 0) {
    facts.push({ modality: 'object', tier: 'high', text: `Important: ${important.map(phraseObject).join(', ')}` });
  }
  const first = others[0];
  if (first) {
    const tier = others.reduce<PriorityTier>(
      (best, object) => (compareTiers(object.tier, best) < 0 ? object.tier : best),
      first.tier
    );
    facts.push({ modality: 'object', tier, text: `Also seen: ${others.map(phraseObject).join(', ')}` });
  }
  return facts;
}

export function describeObjects(objects: readonly TriagedObject[]): string {
  const facts = objectFacts(objects);
  return facts.length > 0 ? composeUtterance(facts) : 'No objects detected';
}

function phraseObject(object: TriagedObject): string {
  return `${object.label} ${object.location.text}`;
}
