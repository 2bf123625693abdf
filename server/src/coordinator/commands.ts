import type { TextMode } from '../perception/perception.types.js';
import { modeFromUtterance } from '../text/text_reader.js';

export type Command =
  | { kind: 'identify' }
  | { kind: 'objects' }
  | { kind: 'read'; mode: TextMode }
  | { kind: 'scan'; mode: TextMode }
  | { kind: 'gestures' }
  | { kind: 'describe' }
  | { kind: 'help' }
  | { kind: 'exit' };

export const HELP_TEXT = [
  'I can help you in several ways.',
  "Say 'who' or 'recognize' to identify people.",
  "Say 'what' or 'see' to describe objects around you.",
  "Say 'read' to read text, with options for signs, labels or displays.",
  "Say 'scan' to keep reading text for a few seconds.",
  "Say 'gesture' to detect hand gestures.",
  "Say 'describe environment' for a complete description.",
  "Or say 'exit' to close the program."
].join(' ');

type Rule = {
  words: readonly string[];
  build: (utterance: string) => Command;
};

const RULES: readonly Rule[] = [
  { words: ['who', 'recognize'], build: () => ({ kind: 'identify' }) },
  { words: ['what', 'see'], build: () => ({ kind: 'objects' }) },
  { words: ['scan', 'continuously'], build: (utterance) => ({ kind: 'scan', mode: modeFromUtterance(utterance) }) },
  { words: ['read'], build: (utterance) => ({ kind: 'read', mode: modeFromUtterance(utterance) }) },
  { words: ['gesture', 'gestures', 'movement'], build: () => ({ kind: 'gestures' }) },
  { words: ['describe', 'environment', 'surroundings'], build: () => ({ kind: 'describe' }) },
  { words: ['help'], build: () => ({ kind: 'help' }) },
  { words: ['exit'], build: () => ({ kind: 'exit' }) }
];

// Apostrophes split words, so "who's" yields "who" and "s".
export function tokenize(utterance: string): string[] {
  return utterance.toLowerCase().match(/[a-z]+/g) ?? [];
}

/**
 * Maps a recognized utterance to a command. Matching is on whole words and the
 * first rule that hits wins, so "what does the sign read" asks for objects.
 */
export function parseCommand(utterance: string): Command | null {
  const words = new Set(tokenize(utterance));
  if (words.size === 0) return null;
  for (const rule of RULES) {
    if (rule.words.some((word) => words.has(word))) {
      return rule.build(utterance);
    }
  }
  return null;
}

export function isStopRequest(utterance: string): boolean {
  const words = tokenize(utterance);
  return words.includes('stop') || words.includes('exit');
}
