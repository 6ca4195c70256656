import '@testing-library/jest-dom/vitest';

class MockPointerEvent extends MouseEvent {
  public pointerId: number;

  public pointerType: string;

  public isPrimary: boolean;

  constructor(type: string, params: PointerEventInit = {}) {
    super(type, params);
    this.pointerId = params.pointerId ?? 1;
    this.pointerType = params.pointerType ?? 'mouse';
    this.isPrimary = params.isPrimary ?? true;
  }
}

if (typeof window.PointerEvent === 'undefined') {
  Object.defineProperty(window, 'PointerEvent', {
    configurable: true,
    writable: true,
    value: MockPointerEvent
  });
}

type CanvasOp = {
  type: string;
  [key: string]: unknown;
};

class MockCanvasContext2D {
  public __ops: CanvasOp[] = [];

  public fillStyle: string | CanvasGradient | CanvasPattern = '#000';

  clearRect = (x: number, y: number, width: number, height: number): void => {
    this.__ops.push({ type: 'clearRect', x, y, width, height });
  };

  beginPath = (): void => {
    this.__ops.push({ type: 'beginPath' });
  };

  fill = (): void => {
    this.__ops.push({ type: 'fill', fillStyle: this.fillStyle });
  };

  arc = (
    x: number,
    y: number,
    radius: number,
    startAngle: number,
    endAngle: number,
    counterclockwise?: boolean
  ): void => {
    this.__ops.push({ type: 'arc', x, y, radius, startAngle, endAngle, counterclockwise });
  };
}

const contextStore = new WeakMap<HTMLCanvasElement, MockCanvasContext2D>();

Object.defineProperty(HTMLCanvasElement.prototype, 'getContext', {
  configurable: true,
  writable: true,
  value(this: HTMLCanvasElement, type: string): MockCanvasContext2D | null {
    if (type !== '2d') {
      return null;
    }

    let context = contextStore.get(this);
    if (!context) {
      context = new MockCanvasContext2D();
      contextStore.set(this, context);
    }
    return context;
  }
});

Object.defineProperty(HTMLCanvasElement.prototype, 'getBoundingClientRect', {
  configurable: true,
  writable: true,
  value() {
    return {
      x: 0,
      y: 0,
      left: 0,
      top: 0,
      right: 1024,
      bottom: 768,
      width: 1024,
      height: 768,
      toJSON() {
        return {};
      }
    };
  }
});
