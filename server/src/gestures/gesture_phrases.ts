import { toSentence, type Fact } from '../facts/facts.js';
import type { GestureLabel } from './classifier.js';

const PHRASES: ReadonlyMap<string, string> = new Map<GestureLabel, string>([
  ['wave', 'someone is waving'],
  ['thumbs_up', 'a thumbs up, indicating approval'],
  ['thumbs_down', 'a thumbs down, indicating disapproval'],
  ['peace', 'a peace sign'],
  ['open_palm', 'an open palm, possibly saying hello or stop'],
  ['pointing', 'someone is pointing'],
  ['namaste', 'someone is greeting with namaste'],
  ['gesture_stop', 'no gestures currently detected']
]);

// Gestures worth interrupting the user for.
export const URGENT_GESTURES: ReadonlySet<string> = new Set<GestureLabel>(['wave', 'open_palm']);

export function describeGesture(label: string): string {
  return PHRASES.get(label) ?? 'Unknown gesture';
}

export function describeGestures(labels: readonly string[]): string {
  if (labels.length === 0) return 'No gestures detected';
  return labels.map((label) => toSentence(describeGesture(label))).join(' ');
}

export function gestureFacts(labels: readonly string[]): Fact[] {
  return labels.map((label) => ({
    modality: 'gesture',
    text: describeGesture(label),
    tier: URGENT_GESTURES.has(label) ? 'high' : 'normal'
  }));
}
