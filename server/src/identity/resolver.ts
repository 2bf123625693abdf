import type { Fact } from '../facts/facts.js';
import type { DetectionRecord, FaceObservation } from '../perception/perception.types.js';
import type { IdentityGallery, KnownIdentity } from './gallery.js';

export const UNKNOWN_PERSON = "someone I don't recognize";

const CLOSE_RELATIONS = new Set([
  'mom',
  'dad',
  'mother',
  'father',
  'brother',
  'sister',
  'son',
  'daughter',
  'wife',
  'husband',
  'grandma',
  'grandpa'
]);

export type IdentityResolverOptions = {
  threshold?: number;
  cooldownMs?: number;
};

export type IdentityMatch = {
  identity: KnownIdentity;
  distance: number;
};

export type IdentityFact = Fact & {
  modality: 'face';
  name: string | null;
  record: DetectionRecord<FaceObservation>;
};

export type IdentityResult = {
  facts: IdentityFact[];
  // Names matched this frame but still inside their cooldown window.
  suppressed: string[];
};

export class IdentityResolver {
  private readonly gallery: IdentityGallery;
  private readonly threshold: number;
  private readonly cooldownMs: number;
  private readonly lastSpokenAt = new Map<string, number>();

  constructor(gallery: IdentityGallery, options: IdentityResolverOptions = {}) {
    this.gallery = gallery;
    this.threshold = options.threshold ?? 0.6;
    this.cooldownMs = options.cooldownMs ?? 5000;
  }

  /** Matches and records every named face as announced at `now`. */
  resolve(faces: readonly FaceObservation[], now: number): IdentityResult {
    const result = this.assess(faces, now);
    this.commit(result.facts, now);
    return result;
  }

  /**
   * Matches faces and applies the cooldown without recording anything. Callers
   * `commit` the facts they end up speaking.
   */
  assess(faces: readonly FaceObservation[], now: number): IdentityResult {
    const facts: IdentityFact[] = [];
    const suppressed: string[] = [];
    const named = new Set<string>();

    for (const face of faces) {
      const match = this.match(face.embedding);
      if (!match) {
        facts.push({
          modality: 'face',
          text: UNKNOWN_PERSON,
          tier: 'high',
          name: null,
          record: { modality: 'face', label: 'unknown', confidence: 0, region: face.region, features: face }
        });
        continue;
      }

      const { name, relation } = match.identity;
      const last = this.lastSpokenAt.get(name);
      if (named.has(name) || (last !== undefined && now - last < this.cooldownMs)) {
        suppressed.push(name);
        continue;
      }

      named.add(name);
      facts.push({
        modality: 'face',
        text: phraseIdentity(name, relation),
        tier: 'medium',
        name,
        record: {
          modality: 'face',
          label: name,
          confidence: clamp(1 - match.distance, 0, 1),
          region: face.region,
          features: face
        }
      });
    }

    return { facts, suppressed };
  }

  commit(facts: readonly IdentityFact[], now: number): void {
    for (const fact of facts) {
      if (fact.name !== null) this.lastSpokenAt.set(fact.name, now);
    }
  }

  /**
   * Nearest gallery entry within the threshold. Ties keep the earliest entry, so a
   * face never resolves to two names.
   */
  match(embedding: readonly number[]): IdentityMatch | null {
    let best: IdentityMatch | null = null;
    for (const identity of this.gallery.entries()) {
      if (identity.embedding.length !== embedding.length) continue;
      const distance = euclideanDistance(identity.embedding, embedding);
      if (!best || distance < best.distance) {
        best = { identity, distance };
      }
    }
    if (!best || best.distance > this.threshold) {
      return null;
    }
    return best;
  }

  lastAnnouncedAt(name: string): number | undefined {
    return this.lastSpokenAt.get(name);
  }
}

export function euclideanDistance(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i += 1) {
    const delta = (a[i] ?? 0) - (b[i] ?? 0);
    sum += delta * delta;
  }
  return Math.sqrt(sum);
}

export function phraseIdentity(name: string, relation: string | null): string {
  if (!relation) return name;
  const tag = relation.trim().toLowerCase();
  if (CLOSE_RELATIONS.has(tag)) {
    return `your ${tag} ${name}`;
  }
  return `${name}, your ${tag}`;
}

export function describeIdentities(result: IdentityResult): string {
  const known = result.facts.filter((fact) => fact.name !== null).map((fact) => fact.text);
  const unknownCount = result.facts.length - known.length;

  if (known.length === 0 && unknownCount === 0) {
    return result.suppressed.length > 0
      ? 'No one new since my last announcement.'
      : "I don't see any faces right now.";
  }

  const parts: string[] = [];
  if (known.length > 0) parts.push(joinNames(known));
  if (unknownCount === 1) parts.push(UNKNOWN_PERSON);
  if (unknownCount > 1) parts.push(`${unknownCount} people I don't recognize`);
  return `I see ${parts.join(' and ')}`;
}

function joinNames(items: string[]): string {
  if (items.length <= 1) return items.join('');
  return `${items.slice(0, -1).join(', ')} and ${items[items.length - 1]}`;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
