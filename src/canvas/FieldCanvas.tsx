import { useEffect, useRef } from 'react';

import { createCanvasSurface } from '../model/render';
import type { FieldStore, Vec2 } from '../model/types';

type FieldCanvasProps = {
  store: FieldStore;
  tickIntervalMs: number;
};

function getCanvasPointFromClient(clientX: number, clientY: number, canvas: HTMLCanvasElement): Vec2 {
  const rect = canvas.getBoundingClientRect();
  return {
    x: clientX - rect.left,
    y: clientY - rect.top
  };
}

export function FieldCanvas({ store, tickIntervalMs }: FieldCanvasProps): JSX.Element {
  const canvasRef = useRef<HTMLCanvasElement | null>(null);

  useEffect(() => {
    const handleResize = (): void => {
      store.resize(window.innerWidth, window.innerHeight);
    };

    window.addEventListener('resize', handleResize);
    return () => {
      window.removeEventListener('resize', handleResize);
    };
  }, [store]);

  // Tracked on the window so overlays above the canvas do not hide the pointer.
  useEffect(() => {
    const handlePointerMove = (event: PointerEvent): void => {
      const canvas = canvasRef.current;
      if (!canvas) {
        return;
      }
      const point = getCanvasPointFromClient(event.clientX, event.clientY, canvas);
      store.movePointer(point.x, point.y);
    };

    window.addEventListener('pointermove', handlePointerMove);
    return () => {
      window.removeEventListener('pointermove', handlePointerMove);
    };
  }, [store]);

  useEffect(() => {
    const canvas = canvasRef.current;
    if (!canvas) {
      return;
    }

    const surface = createCanvasSurface(canvas);
    if (!surface) {
      return;
    }

    const timerId = window.setInterval(() => {
      store.tick(surface);
    }, tickIntervalMs);

    return () => {
      window.clearInterval(timerId);
    };
  }, [store, tickIntervalMs]);

  return <canvas ref={canvasRef} data-testid="field-canvas" className="field-canvas" />;
}
