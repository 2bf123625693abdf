import { EventEmitter } from 'events';
import type { FrameSource } from './frame_source.js';
import type { Frame } from './perception.types.js';

export type PushedFrame = {
  image: Buffer;
  mime: Frame['mime'];
  width?: number;
  height?: number;
};

export type PushFrameSourceOptions = {
  captureTimeoutMs?: number;
  defaultWidth?: number;
  defaultHeight?: number;
};

/**
 * Frames arrive from the outside (the `/frame` route or a `frame` WebSocket
 * message). `capture` hands out each frame at most once and waits for the next
 * one when the latest was already consumed.
 */
export class PushFrameSource extends EventEmitter implements FrameSource {
  readonly label = 'push';
  private readonly captureTimeoutMs: number;
  private readonly defaultWidth: number;
  private readonly defaultHeight: number;
  private running = false;
  private latest: Frame | null = null;
  private lastCapturedId: string | null = null;
  private counter = 0;

  constructor(options: PushFrameSourceOptions = {}) {
    super();
    this.captureTimeoutMs = options.captureTimeoutMs ?? 1000;
    this.defaultWidth = options.defaultWidth ?? 640;
    this.defaultHeight = options.defaultHeight ?? 480;
  }

  async start(): Promise<void> {
    this.running = true;
  }

  async stop(): Promise<void> {
    this.running = false;
    this.emit('stopped');
  }

  get isRunning(): boolean {
    return this.running;
  }

  get latestFrame(): Frame | null {
    return this.latest;
  }

  submit(pushed: PushedFrame): Frame {
    const now = Date.now();
    const frame: Frame = {
      image: pushed.image,
      mime: pushed.mime,
      width: pushed.width ?? this.defaultWidth,
      height: pushed.height ?? this.defaultHeight,
      capturedAt: now,
      id: `${now}-${this.counter++}`
    };
    this.latest = frame;
    this.emit('frame', frame);
    return frame;
  }

  capture(): Promise<Frame | null> {
    if (!this.running) {
      return Promise.reject(new Error('Frame source not started'));
    }
    if (this.latest && this.latest.id !== this.lastCapturedId) {
      return Promise.resolve(this.take(this.latest));
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        cleanup();
        resolve(null);
      }, this.captureTimeoutMs);

      const onFrame = (frame: Frame) => {
        cleanup();
        resolve(this.take(frame));
      };
      const onStopped = () => {
        cleanup();
        resolve(null);
      };

      const cleanup = () => {
        clearTimeout(timer);
        this.off('frame', onFrame);
        this.off('stopped', onStopped);
      };

      this.on('frame', onFrame);
      this.on('stopped', onStopped);
    });
  }

  private take(frame: Frame): Frame {
    this.lastCapturedId = frame.id;
    return frame;
  }
}
