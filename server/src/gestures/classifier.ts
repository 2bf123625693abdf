import type { HandObservation } from '../perception/perception.types.js';
import { classifyStatic, type StaticGesture } from './gesture_rules.js';
import { fingerAngles, fingerStates, isCompleteHand } from './hand_geometry.js';

export type GestureLabel = StaticGesture | 'wave' | 'namaste' | 'gesture_stop';
export type GestureState = 'idle' | 'active';

export type GestureClassifierOptions = {
  historySize?: number;
  waveMinSamples?: number;
  waveVarianceThreshold?: number;
  namasteToleranceDeg?: number;
  inactivityMs?: number;
};

/**
 * Turns per-frame hand landmarks into gesture labels.
 *
 * Static poses come from the finger-extension rules. Waving is read from the
 * variance of the index-finger angle over a rolling window. Namaste needs two
 * hands in one frame whose latest index angles agree within a tolerance.
 *
 * The classifier is `active` once a gesture is seen; the first empty frame after
 * `inactivityMs` without any hand in view yields a single `gesture_stop` and
 * returns it to `idle`.
 */
export class GestureClassifier {
  private readonly historySize: number;
  private readonly waveMinSamples: number;
  private readonly waveVarianceThreshold: number;
  private readonly namasteToleranceDeg: number;
  private readonly inactivityMs: number;

  private history: number[] = [];
  private lastGestureAt: number | null = null;
  private lastLabel: GestureLabel | null = null;

  constructor(options: GestureClassifierOptions = {}) {
    this.historySize = options.historySize ?? 30;
    this.waveMinSamples = options.waveMinSamples ?? 10;
    this.waveVarianceThreshold = options.waveVarianceThreshold ?? 500;
    this.namasteToleranceDeg = options.namasteToleranceDeg ?? 20;
    this.inactivityMs = options.inactivityMs ?? 2000;
  }

  update(hands: readonly HandObservation[], now: number): GestureLabel[] {
    const complete = hands.filter(isCompleteHand);
    const labels: GestureLabel[] = [];

    for (const hand of complete) {
      const label = this.classifyHand(hand);
      if (label) labels.push(label);
    }

    if (labels.length === 0 && complete.length >= 2 && this.isNamaste()) {
      labels.push('namaste');
    }

    // Any visible hand counts as activity, recognised pose or not.
    if (complete.length > 0) {
      this.lastGestureAt = now;
    }

    if (labels.length > 0) {
      this.lastLabel = labels[labels.length - 1] ?? null;
      return labels;
    }

    if (this.lastLabel !== null && this.lastGestureAt !== null && now - this.lastGestureAt > this.inactivityMs) {
      this.lastLabel = null;
      return ['gesture_stop'];
    }

    return [];
  }

  get state(): GestureState {
    return this.lastLabel === null ? 'idle' : 'active';
  }

  get lastDetected(): GestureLabel | null {
    return this.lastLabel;
  }

  angleHistory(): readonly number[] {
    return this.history;
  }

  reset(): void {
    this.history = [];
    this.lastGestureAt = null;
    this.lastLabel = null;
  }

  private classifyHand(hand: HandObservation): GestureLabel | null {
    const angles = fingerAngles(hand.landmarks);
    this.pushAngle(angles.index);
    if (this.isWaving()) {
      return 'wave';
    }
    return classifyStatic(fingerStates(hand.landmarks));
  }

  private pushAngle(angle: number) {
    this.history.push(angle);
    if (this.history.length > this.historySize) {
      this.history.splice(0, this.history.length - this.historySize);
    }
  }

  private isWaving(): boolean {
    if (this.history.length < this.waveMinSamples) return false;
    return variance(this.history) > this.waveVarianceThreshold;
  }

  // Coarse: the two hands' index angles agree; palm contact is not checked.
  private isNamaste(): boolean {
    if (this.history.length < 2) return false;
    const [previous = 0, latest = 0] = this.history.slice(-2);
    return Math.abs(latest - previous) < this.namasteToleranceDeg;
  }
}

export function variance(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
  return values.reduce((sum, value) => sum + (value - mean) ** 2, 0) / values.length;
}
