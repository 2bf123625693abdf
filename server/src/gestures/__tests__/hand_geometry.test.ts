import { describe, expect, it } from 'vitest';
import { fingerAngles, fingerStates, isCompleteHand, palmCenter } from '../hand_geometry.js';
import { poseHand } from '../../perception/mock.perception.js';

describe('hand geometry', () => {
  it('reads extension from joint distances to the palm centre', () => {
    const pose = { thumb: false, index: true, middle: true, ring: false, pinky: false };
    expect(fingerStates(poseHand(pose).landmarks)).toEqual(pose);
  });

  it('does not depend on hand orientation', () => {
    const pose = { thumb: true, index: false, middle: false, ring: false, pinky: true };
    expect(fingerStates(poseHand(pose, 45).landmarks)).toEqual(pose);
    expect(fingerStates(poseHand(pose, 170).landmarks)).toEqual(pose);
  });

  it('measures the fingertip direction from the wrist in degrees', () => {
    const hand = poseHand({ thumb: true, index: true, middle: true, ring: true, pinky: true }, -60);
    expect(fingerAngles(hand.landmarks).index).toBeCloseTo(-60, 6);
    expect(fingerAngles(hand.landmarks).middle).toBeCloseTo(-50, 6);
  });

  it('averages the wrist and finger roots for the palm centre', () => {
    const center = palmCenter(poseHand({ thumb: true, index: true, middle: true, ring: true, pinky: true }).landmarks);
    expect(center.x).toBeCloseTo(0.5, 9);
    expect(center.y).toBeCloseTo(0.6, 9);
  });

  it('rejects hands with missing landmarks', () => {
    const hand = poseHand({ thumb: true, index: true, middle: true, ring: true, pinky: true });
    expect(isCompleteHand(hand)).toBe(true);
    expect(isCompleteHand({ landmarks: hand.landmarks.slice(0, 20) })).toBe(false);
  });
});
