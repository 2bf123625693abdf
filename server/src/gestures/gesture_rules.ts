import type { FingerStates } from './hand_geometry.js';

export const StaticGestures = ['thumbs_up', 'thumbs_down', 'peace', 'open_palm', 'pointing'] as const;
export type StaticGesture = (typeof StaticGestures)[number];

export type GestureRule = {
  label: StaticGesture;
  matches: (fingers: FingerStates) => boolean;
};

const curled = (fingers: FingerStates, ...names: Array<keyof FingerStates>) =>
  names.every((name) => !fingers[name]);

// Evaluated in order; the trigger conditions are pairwise disjoint.
export const STATIC_RULES: readonly GestureRule[] = [
  {
    label: 'thumbs_up',
    matches: (f) => f.thumb && curled(f, 'index', 'middle', 'ring', 'pinky')
  },
  {
    label: 'thumbs_down',
    matches: (f) => !f.thumb && curled(f, 'index', 'middle', 'ring', 'pinky')
  },
  {
    label: 'peace',
    matches: (f) => f.index && f.middle && curled(f, 'ring', 'pinky')
  },
  {
    label: 'open_palm',
    matches: (f) => f.thumb && f.index && f.middle && f.ring && f.pinky
  },
  {
    label: 'pointing',
    matches: (f) => f.index && curled(f, 'middle', 'ring', 'pinky')
  }
];

export function classifyStatic(fingers: FingerStates): StaticGesture | null {
  return STATIC_RULES.find((rule) => rule.matches(fingers))?.label ?? null;
}
