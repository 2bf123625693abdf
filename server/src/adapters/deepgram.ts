import { createClient, LiveTranscriptionEvents } from '@deepgram/sdk';
import type { Logger } from '../logger.js';

export type TranscriptCallback = (text: string) => void;

export type SttStreamHandle = {
  sendAudio: (pcm16Base64: string) => void;
  stop: () => void;
};

/**
 * Streaming speech-to-text. Final transcripts are handed to the callback, which
 * in this service pushes them into the utterance inbox.
 */
export class DeepgramTranscriber {
  private readonly apiKey: string | undefined;
  private readonly logger: Logger;

  constructor(apiKey: string | undefined, logger: Logger) {
    this.apiKey = apiKey;
    this.logger = logger;
  }

  isReady(): boolean {
    return Boolean(this.apiKey);
  }

  startStream(onTranscript: TranscriptCallback, options: { language?: string; sampleRate?: number } = {}): SttStreamHandle {
    if (!this.apiKey) {
      throw new Error('Deepgram API key missing');
    }

    const client = createClient(this.apiKey);
    const connection = client.listen.live({
      model: 'nova-2',
      language: options.language ?? 'en-US',
      encoding: 'linear16',
      sample_rate: options.sampleRate ?? 16000,
      smart_format: true,
      interim_results: false,
      endpointing: 400
    });

    connection.on(LiveTranscriptionEvents.Transcript, (data) => {
      const text = data.channel?.alternatives?.[0]?.transcript?.trim();
      if (!text) return;
      onTranscript(text);
    });

    connection.on(LiveTranscriptionEvents.Error, (error) => {
      this.logger.warn({ error }, 'deepgram stream error');
    });

    const sendAudio = (pcm16Base64: string) => {
      const buffer = Buffer.from(pcm16Base64, 'base64');
      const arrayBuffer = buffer.buffer.slice(buffer.byteOffset, buffer.byteOffset + buffer.byteLength);
      connection.send(arrayBuffer);
    };

    const stop = () => {
      connection.finish();
    };

    return { sendAudio, stop };
  }
}
