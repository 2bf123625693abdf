export interface VoiceChannel {
  /** Resolves once the utterance has finished playing (or is judged to have). */
  speak(text: string): Promise<void>;
  /** Next recognized phrase, or null when nothing was heard within `timeoutMs`. */
  listen(timeoutMs: number, phraseLimitMs: number): Promise<string | null>;
  /** Non-blocking check for a phrase that is already waiting. */
  poll(): string | null;
  close(): Promise<void>;
}
