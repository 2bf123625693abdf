import type { HandObservation, Landmark } from '../perception/perception.types.js';

export const FINGERS = ['thumb', 'index', 'middle', 'ring', 'pinky'] as const;
export type Finger = (typeof FINGERS)[number];

export type FingerStates = Record<Finger, boolean>;
export type FingerAngles = Record<Finger, number>;

export const HAND_LANDMARK_COUNT = 21;
export const WRIST = 0;

// [tip, middle joint, base joint] per finger, MediaPipe indices.
export const FINGER_JOINTS: Record<Finger, readonly [number, number, number]> = {
  thumb: [4, 3, 2],
  index: [8, 7, 6],
  middle: [12, 11, 10],
  ring: [16, 15, 14],
  pinky: [20, 19, 18]
};

const PALM_POINTS = [0, 5, 9, 13, 17] as const;

export function isCompleteHand(hand: HandObservation): boolean {
  return hand.landmarks.length >= HAND_LANDMARK_COUNT;
}

export function palmCenter(landmarks: readonly Landmark[]): Landmark {
  let x = 0;
  let y = 0;
  let z = 0;
  for (const index of PALM_POINTS) {
    const point = landmarkAt(landmarks, index);
    x += point.x;
    y += point.y;
    z += point.z ?? 0;
  }
  return { x: x / PALM_POINTS.length, y: y / PALM_POINTS.length, z: z / PALM_POINTS.length };
}

/**
 * A finger is extended when tip, middle joint and base joint are strictly ordered
 * by decreasing distance from the palm centre. Independent of hand orientation.
 */
export function fingerStates(landmarks: readonly Landmark[]): FingerStates {
  const palm = palmCenter(landmarks);
  const extended = (finger: Finger): boolean => {
    const [tip, mid, base] = FINGER_JOINTS[finger];
    const tipDist = distance(landmarkAt(landmarks, tip), palm);
    const midDist = distance(landmarkAt(landmarks, mid), palm);
    const baseDist = distance(landmarkAt(landmarks, base), palm);
    return tipDist > midDist && midDist > baseDist;
  };
  return {
    thumb: extended('thumb'),
    index: extended('index'),
    middle: extended('middle'),
    ring: extended('ring'),
    pinky: extended('pinky')
  };
}

// Fingertip direction relative to the wrist, degrees in (-180, 180].
export function fingerAngles(landmarks: readonly Landmark[]): FingerAngles {
  const wrist = landmarkAt(landmarks, WRIST);
  const angle = (finger: Finger): number => {
    const tip = landmarkAt(landmarks, FINGER_JOINTS[finger][0]);
    return (Math.atan2(tip.y - wrist.y, tip.x - wrist.x) * 180) / Math.PI;
  };
  return {
    thumb: angle('thumb'),
    index: angle('index'),
    middle: angle('middle'),
    ring: angle('ring'),
    pinky: angle('pinky')
  };
}

export function distance(a: Landmark, b: Landmark): number {
  const dz = (a.z ?? 0) - (b.z ?? 0);
  return Math.hypot(a.x - b.x, a.y - b.y, dz);
}

function landmarkAt(landmarks: readonly Landmark[], index: number): Landmark {
  const point = landmarks[index];
  if (!point) {
    throw new RangeError(`hand landmark ${index} missing`);
  }
  return point;
}
