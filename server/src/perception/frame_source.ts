import type { Frame } from './perception.types.js';

export interface FrameSource {
  readonly label: string;
  start(): Promise<void>;
  stop(): Promise<void>;
  /** Latest fresh frame, or null when none arrived in time. */
  capture(): Promise<Frame | null>;
}
