import { WebSocketServer, WebSocket } from 'ws';
import type { Server as HttpServer } from 'http';
import { ClientMessageSchema, type ServerMessage } from './schemas.js';
import type { DeepgramTranscriber, SttStreamHandle } from '../adapters/deepgram.js';
import type { PushFrameSource } from '../perception/frame_source_push.js';
import type { UtteranceInbox } from '../voice/utterance_inbox.js';
import type { SpeechOutlet } from '../voice/ws_voice.js';
import type { Logger } from '../logger.js';

export type WsHub = SpeechOutlet & {
  clientCount: () => number;
  close: () => Promise<void>;
};

export function createWsHub(params: {
  server: HttpServer;
  path: string;
  inbox: UtteranceInbox;
  frames: PushFrameSource | null;
  transcriber: DeepgramTranscriber;
  logger: Logger;
}): WsHub {
  const wss = new WebSocketServer({ server: params.server, path: params.path });
  const streams = new Map<WebSocket, SttStreamHandle>();
  const speechDoneListeners: Array<(id: string) => void> = [];

  const send = (ws: WebSocket, message: ServerMessage) => {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(message));
    }
  };

  const broadcast = (message: ServerMessage): number => {
    let delivered = 0;
    for (const client of wss.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(JSON.stringify(message));
        delivered += 1;
      }
    }
    return delivered;
  };

  const streamFor = (ws: WebSocket, sampleRate: number): SttStreamHandle | null => {
    const existing = streams.get(ws);
    if (existing) return existing;
    if (!params.transcriber.isReady()) {
      send(ws, { type: 'error', code: 'deepgram_unavailable', message: 'Deepgram API key missing.' });
      return null;
    }
    try {
      const stream = params.transcriber.startStream((text) => params.inbox.push(text), { sampleRate });
      streams.set(ws, stream);
      return stream;
    } catch (error) {
      params.logger.warn({ error }, 'deepgram start failed');
      send(ws, { type: 'error', code: 'deepgram_start_failed', message: 'Failed to start Deepgram stream.' });
      return null;
    }
  };

  wss.on('connection', (ws) => {
    params.logger.info({ clients: wss.clients.size }, 'voice client connected');

    ws.on('message', (data) => {
      let parsedMessage: unknown;
      try {
        parsedMessage = JSON.parse(data.toString());
      } catch {
        send(ws, { type: 'error', code: 'invalid_json', message: 'Invalid JSON.' });
        return;
      }

      const result = ClientMessageSchema.safeParse(parsedMessage);
      if (!result.success) {
        send(ws, { type: 'error', code: 'invalid_message', message: 'Message failed validation.' });
        return;
      }

      const message = result.data;
      switch (message.type) {
        case 'utterance': {
          params.inbox.push(message.text);
          break;
        }
        case 'audio_chunk': {
          streamFor(ws, message.sampleRate)?.sendAudio(message.pcm16_base64);
          break;
        }
        case 'frame': {
          if (!params.frames) {
            send(ws, { type: 'error', code: 'frames_not_accepted', message: 'Frame source is not push.' });
            return;
          }
          params.frames.submit({
            image: Buffer.from(message.image_base64, 'base64'),
            mime: message.mime,
            width: message.width,
            height: message.height
          });
          break;
        }
        case 'speech_done': {
          for (const listener of speechDoneListeners) listener(message.id);
          break;
        }
      }
    });

    ws.on('close', () => {
      streams.get(ws)?.stop();
      streams.delete(ws);
    });
  });

  wss.on('listening', () => {
    params.logger.info({ path: params.path }, 'websocket server listening');
  });

  return {
    broadcast,
    onSpeechDone: (listener) => {
      speechDoneListeners.push(listener);
    },
    clientCount: () => wss.clients.size,
    close: () =>
      new Promise<void>((resolve, reject) => {
        for (const stream of streams.values()) stream.stop();
        streams.clear();
        for (const client of wss.clients) client.close();
        wss.close((error) => (error ? reject(error) : resolve()));
      })
  };
}
