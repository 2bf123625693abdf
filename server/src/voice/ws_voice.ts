import type { Logger } from '../logger.js';
import type { ServerMessage } from '../ws/schemas.js';
import type { UtteranceInbox } from './utterance_inbox.js';
import type { VoiceChannel } from './voice.types.js';

export interface SpeechOutlet {
  broadcast(message: ServerMessage): number;
  onSpeechDone(listener: (id: string) => void): void;
}

export type WsVoiceOptions = {
  wordsPerMinute?: number;
  minSpeechMs?: number;
};

/**
 * Speaks through whichever WebSocket clients are connected. The client plays the
 * text and acks with `speech_done`; without an ack the channel waits roughly as
 * long as the sentence would take to say.
 */
export class WsVoiceChannel implements VoiceChannel {
  private readonly pending = new Map<string, () => void>();
  private readonly wordsPerMinute: number;
  private readonly minSpeechMs: number;
  private counter = 0;

  constructor(
    private readonly outlet: SpeechOutlet,
    private readonly inbox: UtteranceInbox,
    private readonly logger: Logger,
    options: WsVoiceOptions = {}
  ) {
    this.wordsPerMinute = options.wordsPerMinute ?? 160;
    this.minSpeechMs = options.minSpeechMs ?? 800;
    outlet.onSpeechDone((id) => this.acknowledge(id));
  }

  speak(text: string): Promise<void> {
    const id = `speech-${++this.counter}`;
    const delivered = this.outlet.broadcast({ type: 'speech', id, text });
    if (delivered === 0) {
      this.logger.info({ text }, 'no voice client connected');
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        resolve();
      }, estimateSpeechMs(text, this.wordsPerMinute, this.minSpeechMs));
      this.pending.set(id, () => {
        clearTimeout(timer);
        resolve();
      });
    });
  }

  acknowledge(id: string): void {
    const done = this.pending.get(id);
    if (!done) return;
    this.pending.delete(id);
    done();
  }

  listen(timeoutMs: number, phraseLimitMs: number): Promise<string | null> {
    return this.inbox.listen(timeoutMs, phraseLimitMs);
  }

  poll(): string | null {
    return this.inbox.poll();
  }

  async close(): Promise<void> {
    for (const done of this.pending.values()) done();
    this.pending.clear();
    this.inbox.close();
  }
}

export function estimateSpeechMs(text: string, wordsPerMinute: number, minSpeechMs: number): number {
  const words = text.split(/\s+/).filter(Boolean).length;
  return Math.max(minSpeechMs, Math.round((words * 60_000) / wordsPerMinute));
}
