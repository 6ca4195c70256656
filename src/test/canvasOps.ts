export type CanvasOp = {
  type: string;
  [key: string]: unknown;
};

function hasOps(value: unknown): value is { __ops: CanvasOp[] } {
  return typeof value === 'object' && value !== null && '__ops' in value && Array.isArray(value.__ops);
}

export function canvasOps(canvas: HTMLCanvasElement): CanvasOp[] {
  const ctx: unknown = canvas.getContext('2d');
  if (!hasOps(ctx)) {
    throw new Error('Canvas context is not the recording mock.');
  }
  return ctx.__ops;
}
