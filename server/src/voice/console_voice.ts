import readline from 'readline';
import type { Logger } from '../logger.js';
import type { UtteranceInbox } from './utterance_inbox.js';
import type { VoiceChannel } from './voice.types.js';

// Local runs: speech goes to stdout, each stdin line is one utterance.
export class ConsoleVoiceChannel implements VoiceChannel {
  private readonly rl: readline.Interface;

  constructor(
    private readonly inbox: UtteranceInbox,
    private readonly logger: Logger,
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = readline.createInterface({ input, terminal: false });
    this.rl.on('line', (line) => this.inbox.push(line));
    this.rl.on('close', () => this.logger.debug('console input closed'));
  }

  async speak(text: string): Promise<void> {
    this.output.write(`>> ${text}\n`);
  }

  listen(timeoutMs: number, phraseLimitMs: number): Promise<string | null> {
    return this.inbox.listen(timeoutMs, phraseLimitMs);
  }

  poll(): string | null {
    return this.inbox.poll();
  }

  async close(): Promise<void> {
    this.rl.close();
    this.inbox.close();
  }
}
