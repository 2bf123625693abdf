import type { Frame, TextAdapter, TextMode } from '../perception/perception.types.js';

export const NO_TEXT = 'No text detected';

const MODE_KEYWORDS: ReadonlyArray<readonly [TextMode, string]> = [
  ['sign', 'sign'],
  ['label', 'label'],
  ['display', 'display'],
  ['display', 'screen'],
  ['scene', 'scene']
];

export type TextReading = {
  mode: TextMode;
  text: string;
  confidence: number;
  at: number;
};

export type TextReaderOptions = {
  minConfidence?: number;
  historyMs?: number;
};

export function modeFromUtterance(utterance: string): TextMode {
  const words = new Set(utterance.toLowerCase().match(/[a-z]+/g) ?? []);
  for (const [mode, keyword] of MODE_KEYWORDS) {
    if (words.has(keyword)) return mode;
  }
  return 'document';
}

export function formatReading(mode: TextMode, text: string): string {
  switch (mode) {
    case 'sign':
      return `Sign reads: ${text}`;
    case 'label':
      return `Label says: ${text}`;
    case 'display':
      return `Display shows: ${text}`;
    case 'scene':
      return `Detected text: ${text}`;
    case 'document':
      return text;
  }
}

export class TextReader {
  private readonly adapter: TextAdapter;
  private readonly minConfidence: number;
  private readonly historyMs: number;
  private history: TextReading[] = [];

  constructor(adapter: TextAdapter, options: TextReaderOptions = {}) {
    this.adapter = adapter;
    this.minConfidence = options.minConfidence ?? 0.6;
    this.historyMs = options.historyMs ?? 5000;
  }

  async read(frame: Frame, mode: TextMode, now: number): Promise<string> {
    const observation = await this.adapter.readText(frame, mode);
    const text = observation?.text.trim() ?? '';
    if (!observation || !text || observation.confidence < this.minConfidence) {
      return NO_TEXT;
    }

    this.history = this.history.filter((reading) => reading.at > now - this.historyMs);
    this.history.push({ mode, text, confidence: observation.confidence, at: now });
    return formatReading(mode, text);
  }

  recent(now: number): TextReading[] {
    return this.history.filter((reading) => reading.at > now - this.historyMs);
  }
}
