export class Position {
  x: number;

  y: number;

  z: number;

  constructor(x = 0, y = 0, z = 0) {
    this.x = x;
    this.y = y;
    this.z = z;
  }

  addX(delta: number): void {
    this.x += delta;
  }

  addY(delta: number): void {
    this.y += delta;
  }

  addZ(delta: number): void {
    this.z += delta;
  }

  /**
   * `x` is always written. `y` and `z` are only written when passed, so
   * `set(5)` keeps the previous y/z while `set(5, 0, 0)` zeroes them.
   */
  set(x: number, y?: number, z?: number): void {
    this.x = x;
    if (y !== undefined) {
      this.y = y;
    }
    if (z !== undefined) {
      this.z = z;
    }
  }
}
