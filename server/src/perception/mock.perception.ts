import { FINGERS, type Finger, type FingerStates } from '../gestures/hand_geometry.js';
import type {
  FaceObservation,
  Frame,
  HandObservation,
  Landmark,
  ObjectObservation,
  PerceptionAdapters,
  TextObservation
} from './perception.types.js';

export type MockScene = {
  faces?: FaceObservation[];
  hands?: HandObservation[];
  objects?: ObjectObservation[];
  text?: TextObservation | null;
};

const PALM_CENTER = { x: 0.5, y: 0.6 };

// MCP offsets sum to zero so the palm centre sits exactly on the wrist.
const MCP_OFFSETS: ReadonlyArray<readonly [number, number, number]> = [
  [5, -0.03, 0],
  [9, -0.01, 0],
  [13, 0.01, 0],
  [17, 0.03, 0]
];

const JOINTS: Record<Finger, readonly [number, number, number, number]> = {
  thumb: [1, 2, 3, 4],
  index: [5, 6, 7, 8],
  middle: [9, 10, 11, 12],
  ring: [13, 14, 15, 16],
  pinky: [17, 18, 19, 20]
};

const SPREAD_DEG: Record<Finger, number> = {
  thumb: -60,
  index: 0,
  middle: 10,
  ring: 20,
  pinky: 30
};

/**
 * Synthetic 21-point hand. Each finger points along its own direction from the
 * wrist; extended fingers have joints at increasing radii, curled ones fold the
 * tip back toward the palm. `indexAngleDeg` is the index fingertip direction.
 */
export function poseHand(states: FingerStates, indexAngleDeg = -90): HandObservation {
  const landmarks: Landmark[] = Array.from({ length: 21 }, () => ({ x: PALM_CENTER.x, y: PALM_CENTER.y, z: 0 }));

  for (const [index, dx, dy] of MCP_OFFSETS) {
    landmarks[index] = { x: PALM_CENTER.x + dx, y: PALM_CENTER.y + dy, z: 0 };
  }

  for (const finger of FINGERS) {
    const radians = ((indexAngleDeg + SPREAD_DEG[finger]) * Math.PI) / 180;
    const along = (radius: number): Landmark => ({
      x: PALM_CENTER.x + radius * Math.cos(radians),
      y: PALM_CENTER.y + radius * Math.sin(radians),
      z: 0
    });
    const [first, base, mid, tip] = JOINTS[finger];
    if (finger === 'thumb') {
      landmarks[first] = along(0.03);
    }
    landmarks[base] = along(0.06);
    landmarks[mid] = along(0.09);
    landmarks[tip] = along(states[finger] ? 0.12 : 0.04);
  }

  return { landmarks };
}

const OPEN: FingerStates = { thumb: true, index: true, middle: true, ring: true, pinky: true };

export const DEFAULT_SCENES: readonly MockScene[] = [
  {},
  {
    faces: [{ embedding: [0.1, 0.2, 0.3, 0.4], region: { x: 40, y: 120, width: 160, height: 200 } }],
    objects: [{ label: 'cup', confidence: 0.8, region: { x: 420, y: 300, width: 60, height: 80 } }]
  },
  {
    objects: [
      { label: 'person', confidence: 0.91, region: { x: 0, y: 160, width: 180, height: 300 } },
      { label: 'chair', confidence: 0.7, region: { x: 300, y: 250, width: 120, height: 160 } }
    ],
    text: { text: 'EXIT', confidence: 0.88 }
  },
  {
    hands: [poseHand(OPEN)]
  },
  {
    faces: [{ embedding: [0.9, 0.9, 0.9, 0.9] }]
  }
];

/**
 * Deterministic stand-in for every perception collaborator. Scenes advance once
 * per new frame id and wrap around; all adapters see the same scene for a frame.
 */
export class MockPerception {
  private readonly scenes: readonly MockScene[];
  private index = -1;
  private lastFrameId: string | null = null;

  constructor(scenes: readonly MockScene[] = DEFAULT_SCENES) {
    this.scenes = scenes.length > 0 ? scenes : [{}];
  }

  adapters(): PerceptionAdapters {
    return {
      faces: { detectFaces: async (frame) => this.sceneFor(frame).faces ?? [] },
      hands: { detectHands: async (frame) => this.sceneFor(frame).hands ?? [] },
      objects: { detectObjects: async (frame) => this.sceneFor(frame).objects ?? [] },
      text: { readText: async (frame) => this.sceneFor(frame).text ?? null }
    };
  }

  sceneFor(frame: Frame): MockScene {
    if (frame.id !== this.lastFrameId) {
      this.lastFrameId = frame.id;
      this.index = (this.index + 1) % this.scenes.length;
    }
    return this.scenes[this.index] ?? {};
  }
}
