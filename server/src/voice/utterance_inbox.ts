type Waiter = (text: string | null) => void;

export type UtteranceInboxOptions = {
  fragmentGapMs?: number;
};

/**
 * Queue of recognized phrases shared by every transcript producer (typed
 * utterances, Deepgram, stdin). Speech recognizers deliver long sentences in
 * fragments; `listen` stitches fragments that arrive close together.
 */
export class UtteranceInbox {
  private readonly fragmentGapMs: number;
  private readonly queue: string[] = [];
  private waiters: Waiter[] = [];
  private closed = false;

  constructor(options: UtteranceInboxOptions = {}) {
    this.fragmentGapMs = options.fragmentGapMs ?? 600;
  }

  push(text: string): void {
    const trimmed = text.trim();
    if (!trimmed || this.closed) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(trimmed);
      return;
    }
    this.queue.push(trimmed);
  }

  poll(): string | null {
    return this.queue.shift() ?? null;
  }

  get pending(): number {
    return this.queue.length;
  }

  next(timeoutMs: number): Promise<string | null> {
    const queued = this.queue.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    if (this.closed || timeoutMs <= 0) return Promise.resolve(null);

    return new Promise((resolve) => {
      const waiter: Waiter = (text) => {
        clearTimeout(timer);
        resolve(text);
      };
      const timer = setTimeout(() => {
        this.waiters = this.waiters.filter((candidate) => candidate !== waiter);
        resolve(null);
      }, timeoutMs);
      this.waiters.push(waiter);
    });
  }

  async listen(timeoutMs: number, phraseLimitMs: number): Promise<string | null> {
    const first = await this.next(timeoutMs);
    if (first === null) return null;

    const parts = [first];
    const startedAt = Date.now();
    for (;;) {
      const remaining = phraseLimitMs - (Date.now() - startedAt);
      if (remaining <= 0) break;
      const fragment = await this.next(Math.min(this.fragmentGapMs, remaining));
      if (fragment === null) break;
      parts.push(fragment);
    }
    return parts.join(' ');
  }

  close(): void {
    this.closed = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter(null);
  }
}
