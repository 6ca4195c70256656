import { AnimatedPoint } from './animatedPoint';
import { layoutOffset, SEED_POINTS } from './layout';
import { Position } from './position';
import type { DrawingSurface, SeedPoint, Size, Vec2 } from './types';

export const INTERACTION_RADIUS = 150;

export class PointField {
  readonly points: AnimatedPoint[] = [];

  readonly pointerPosition = new Position(0, 0, 0);

  private anchor: Vec2;

  /**
   * `anchor` is the layout offset the rest positions are currently placed
   * against; `recenter` moves every point from it to the new offset.
   */
  constructor(anchor: Vec2 = { x: 0, y: 0 }) {
    this.anchor = { x: anchor.x, y: anchor.y };
  }

  getAnchor(): Vec2 {
    return { x: this.anchor.x, y: this.anchor.y };
  }

  addPoint(x: number, y: number, z: number, size: number, color: string): AnimatedPoint {
    const point = new AnimatedPoint(x, y, z, size, color);
    this.points.push(point);
    return point;
  }

  update(): void {
    for (const point of this.points) {
      const dx = this.pointerPosition.x - point.currentPosition.x;
      const dy = this.pointerPosition.y - point.currentPosition.y;
      const d = Math.sqrt(dx * dx + dy * dy);

      if (d < INTERACTION_RADIUS) {
        // Push away by the raw pointer offset, not a unit direction.
        point.targetPosition.x = point.currentPosition.x - dx;
        point.targetPosition.y = point.currentPosition.y - dy;
      } else {
        point.targetPosition.x = point.restPosition.x;
        point.targetPosition.y = point.restPosition.y;
      }

      point.update();
    }
  }

  draw(surface: DrawingSurface): void {
    for (const point of this.points) {
      point.draw(surface);
    }
  }

  recenter(surfaceWidth: number, surfaceHeight: number): void {
    const offset = layoutOffset(surfaceWidth, surfaceHeight);

    for (const point of this.points) {
      const relX = point.restPosition.x - this.anchor.x;
      const relY = point.restPosition.y - this.anchor.y;

      point.restPosition.x = offset.x + relX;
      point.restPosition.y = offset.y + relY;
      point.currentPosition.x = point.restPosition.x;
      point.currentPosition.y = point.restPosition.y;
    }

    this.anchor = offset;
  }
}

export function createSeededField(size: Size, seeds: readonly SeedPoint[] = SEED_POINTS): PointField {
  const offset = layoutOffset(size.width, size.height);
  const field = new PointField(offset);

  for (const seed of seeds) {
    field.addPoint(offset.x + seed.x, offset.y + seed.y, seed.z, seed.size, seed.color);
  }

  return field;
}
