import { Position } from './position';
import type { DrawingSurface } from './types';

export const DEFAULT_SPRING_STRENGTH = 0.1;
export const DEFAULT_FRICTION = 0.8;
export const DEPTH_DIVISOR = 100;
export const MIN_RADIUS = 1;

export class AnimatedPoint {
  readonly currentPosition: Position;

  readonly targetPosition: Position;

  readonly restPosition: Position;

  readonly velocity = new Position(0, 0, 0);

  springStrength = DEFAULT_SPRING_STRENGTH;

  friction = DEFAULT_FRICTION;

  readonly baseRadius: number;

  currentRadius: number;

  readonly color: string;

  constructor(x: number, y: number, z: number, size: number, color: string) {
    this.currentPosition = new Position(x, y, z);
    this.targetPosition = new Position(x, y, z);
    this.restPosition = new Position(x, y, z);
    this.baseRadius = size;
    this.currentRadius = size;
    this.color = color;
  }

  private impulse(target: number, current: number): number {
    return (target - current) * this.springStrength;
  }

  /**
   * One spring step per axis: add the impulse, damp, then move. The depth
   * target grows with the planar distance from rest, which drives the radius.
   */
  update(): void {
    this.velocity.addX(this.impulse(this.targetPosition.x, this.currentPosition.x));
    this.velocity.x *= this.friction;
    this.currentPosition.addX(this.velocity.x);

    this.velocity.addY(this.impulse(this.targetPosition.y, this.currentPosition.y));
    this.velocity.y *= this.friction;
    this.currentPosition.addY(this.velocity.y);

    const dx = this.restPosition.x - this.currentPosition.x;
    const dy = this.restPosition.y - this.currentPosition.y;
    const displacement = Math.sqrt(dx * dx + dy * dy);
    this.targetPosition.z = displacement / DEPTH_DIVISOR + 1;

    this.velocity.addZ(this.impulse(this.targetPosition.z, this.currentPosition.z));
    this.velocity.z *= this.friction;
    this.currentPosition.addZ(this.velocity.z);

    this.currentRadius = Math.max(MIN_RADIUS, this.baseRadius * this.currentPosition.z);
  }

  draw(surface: DrawingSurface): void {
    surface.fillDisc(
      { x: this.currentPosition.x, y: this.currentPosition.y },
      this.currentRadius,
      this.color
    );
  }
}
