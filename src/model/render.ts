import type { DrawingSurface, Rect, Vec2 } from './types';

const FULL_TURN = Math.PI * 2;

export function createContextSurface(
  ctx: CanvasRenderingContext2D,
  canvas: HTMLCanvasElement
): DrawingSurface {
  return {
    clear(region: Rect): void {
      ctx.clearRect(region.x, region.y, region.width, region.height);
    },

    fillDisc(center: Vec2, radius: number, color: string): void {
      ctx.fillStyle = color;
      ctx.beginPath();
      ctx.arc(center.x, center.y, radius, 0, FULL_TURN, false);
      ctx.fill();
    },

    setSurfaceSize(width: number, height: number): void {
      canvas.width = Math.round(width);
      canvas.height = Math.round(height);
    }
  };
}

export function createCanvasSurface(canvas: HTMLCanvasElement): DrawingSurface | null {
  const ctx = canvas.getContext('2d');
  if (!ctx) {
    return null;
  }
  return createContextSurface(ctx, canvas);
}
