import seedPoints from './seedPoints.json';
import type { SeedPoint, Vec2 } from './types';

// Half the authored shape's bounding box, so the shape itself is centered.
export const SHAPE_HALF_WIDTH = 180;
export const SHAPE_HALF_HEIGHT = 65;

export const SEED_POINTS: readonly SeedPoint[] = seedPoints;

export function layoutOffset(width: number, height: number): Vec2 {
  return {
    x: width / 2 - SHAPE_HALF_WIDTH,
    y: height / 2 - SHAPE_HALF_HEIGHT
  };
}
