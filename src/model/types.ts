import type { PointField } from './pointField';

export type Vec2 = {
  x: number;
  y: number;
};

export type Size = {
  width: number;
  height: number;
};

export type Rect = {
  x: number;
  y: number;
  width: number;
  height: number;
};

export type SeedPoint = {
  x: number;
  y: number;
  z: number;
  size: number;
  color: string;
};

export interface DrawingSurface {
  clear(region: Rect): void;
  fillDisc(center: Vec2, radius: number, color: string): void;
  setSurfaceSize(width: number, height: number): void;
}

export type FieldEvent =
  | { type: 'pointer'; x: number; y: number }
  | { type: 'resize'; width: number; height: number }
  | { type: 'reset' };

export type FieldOptions = {
  tickIntervalMs: number;
  bannerDurationMs: number;
  resetKey: string;
};

export type Result = {
  ok: boolean;
  reason?: string;
};

export type FieldStoreState = {
  size: Size;
  field: PointField;
  tickCount: number;
  resetCount: number;
  disposed: boolean;
};

export interface FieldStore {
  getState(): FieldStoreState;
  subscribe(listener: () => void): () => void;
  enqueue(event: FieldEvent): Result;
  movePointer(x: number, y: number): Result;
  resize(width: number, height: number): Result;
  reset(): Result;
  tick(surface: DrawingSurface): Result;
  dispose(): void;
}
