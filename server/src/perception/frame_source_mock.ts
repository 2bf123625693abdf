import type { FrameSource } from './frame_source.js';
import type { Frame } from './perception.types.js';

// Blank frames with increasing ids; pairs with MockPerception.
export class MockFrameSource implements FrameSource {
  readonly label = 'mock';
  private running = false;
  private counter = 0;

  constructor(
    private readonly width = 640,
    private readonly height = 480
  ) {}

  async start(): Promise<void> {
    this.running = true;
  }

  async stop(): Promise<void> {
    this.running = false;
  }

  async capture(): Promise<Frame | null> {
    if (!this.running) return null;
    const now = Date.now();
    return {
      image: Buffer.alloc(0),
      mime: 'application/octet-stream',
      width: this.width,
      height: this.height,
      capturedAt: now,
      id: `mock-${this.counter++}`
    };
  }
}
