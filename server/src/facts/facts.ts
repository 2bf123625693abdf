import type { Modality } from '../perception/perception.types.js';

export const PriorityTiers = ['high', 'medium', 'low', 'normal'] as const;
export type PriorityTier = (typeof PriorityTiers)[number];

export type Fact = {
  modality: Modality | 'system';
  text: string;
  tier: PriorityTier;
};

const TIER_RANK: Record<PriorityTier, number> = {
  high: 0,
  medium: 1,
  low: 2,
  normal: 3
};

export function compareTiers(a: PriorityTier, b: PriorityTier): number {
  return TIER_RANK[a] - TIER_RANK[b];
}

// Array.prototype.sort is stable, so facts of one tier keep their arrival order.
export function sortFacts<T extends { tier: PriorityTier }>(facts: readonly T[]): T[] {
  return [...facts].sort((a, b) => compareTiers(a.tier, b.tier));
}

/**
 * Merges facts into one utterance: highest tier first, one sentence per fact.
 */
export function composeUtterance(facts: readonly Fact[]): string {
  return sortFacts(facts)
    .map((fact) => toSentence(fact.text))
    .filter((sentence) => sentence.length > 0)
    .join(' ');
}

export function toSentence(text: string): string {
  const trimmed = text.trim();
  if (!trimmed) return '';
  const capitalized = trimmed.charAt(0).toUpperCase() + trimmed.slice(1);
  return /[.!?]$/.test(capitalized) ? capitalized : `${capitalized}.`;
}
