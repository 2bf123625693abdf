import type { BoundingRegion } from '../perception/perception.types.js';
import { area } from './boxes.js';

export type HorizontalPosition = 'on the left' | 'in the center' | 'on the right';
export type VerticalPosition = 'top' | 'middle' | 'bottom';
export type DistanceBand = 'very close' | 'nearby' | 'further away';

export type SpatialDescription = {
  horizontal: HorizontalPosition;
  vertical: VerticalPosition;
  distance: DistanceBand;
  text: string;
};

export function locate(region: BoundingRegion, frameWidth: number, frameHeight: number): SpatialDescription {
  const centerX = region.x + region.width / 2;
  const centerY = region.y + region.height / 2;

  const horizontal: HorizontalPosition =
    centerX < frameWidth / 3 ? 'on the left' : centerX < (2 * frameWidth) / 3 ? 'in the center' : 'on the right';
  const vertical: VerticalPosition =
    centerY < frameHeight / 3 ? 'top' : centerY < (2 * frameHeight) / 3 ? 'middle' : 'bottom';

  const frameArea = frameWidth * frameHeight;
  const ratio = frameArea > 0 ? area(region) / frameArea : 0;
  const distance: DistanceBand = ratio > 0.3 ? 'very close' : ratio > 0.1 ? 'nearby' : 'further away';

  return { horizontal, vertical, distance, text: `${horizontal} ${vertical}, ${distance}` };
}
