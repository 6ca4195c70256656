import { log } from './log';
import { createSeededField } from './pointField';
import type {
  DrawingSurface,
  FieldEvent,
  FieldStore,
  FieldStoreState,
  Result,
  Size
} from './types';

function isValidSize(width: number, height: number): boolean {
  return Number.isFinite(width) && Number.isFinite(height) && width > 0 && height > 0;
}

export function createFieldStore(initialSize: Size): FieldStore {
  const listeners = new Set<() => void>();
  const queue: FieldEvent[] = [];
  let sizedSurface: DrawingSurface | null = null;
  let sizedTo: Size | null = null;

  const state: FieldStoreState = {
    size: { width: initialSize.width, height: initialSize.height },
    field: createSeededField(initialSize),
    tickCount: 0,
    resetCount: 0,
    disposed: false
  };

  log.store('created %dx%d with %d points', state.size.width, state.size.height, state.field.points.length);

  const emit = (): void => {
    for (const listener of listeners) {
      listener();
    }
  };

  const applyEvent = (event: FieldEvent): void => {
    switch (event.type) {
      case 'pointer':
        state.field.pointerPosition.set(event.x, event.y, 0);
        return;
      case 'resize':
        state.size = { width: event.width, height: event.height };
        state.field.recenter(event.width, event.height);
        log.store('resized to %dx%d', event.width, event.height);
        return;
      case 'reset': {
        const pointer = state.field.pointerPosition;
        const field = createSeededField(state.size);
        field.pointerPosition.set(pointer.x, pointer.y, pointer.z);
        state.field = field;
        state.resetCount += 1;
        log.store('Points reset!');
        return;
      }
    }
  };

  const ensureSurfaceSize = (surface: DrawingSurface): void => {
    if (
      sizedSurface === surface &&
      sizedTo &&
      sizedTo.width === state.size.width &&
      sizedTo.height === state.size.height
    ) {
      return;
    }
    surface.setSurfaceSize(state.size.width, state.size.height);
    sizedSurface = surface;
    sizedTo = { width: state.size.width, height: state.size.height };
  };

  const store: FieldStore = {
    getState(): FieldStoreState {
      return state;
    },

    subscribe(listener: () => void): () => void {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    enqueue(event): Result {
      if (state.disposed) {
        return { ok: false, reason: 'Store is disposed.' };
      }
      if (event.type === 'pointer' && !(Number.isFinite(event.x) && Number.isFinite(event.y))) {
        log.input('rejected pointer sample %o', event);
        return { ok: false, reason: 'Pointer coordinates must be finite.' };
      }
      if (event.type === 'resize' && !isValidSize(event.width, event.height)) {
        log.input('rejected resize %o', event);
        return { ok: false, reason: 'Surface size must be positive and finite.' };
      }
      queue.push(event);
      return { ok: true };
    },

    movePointer(x, y): Result {
      return store.enqueue({ type: 'pointer', x, y });
    },

    resize(width, height): Result {
      return store.enqueue({ type: 'resize', width, height });
    },

    reset(): Result {
      return store.enqueue({ type: 'reset' });
    },

    tick(surface): Result {
      if (state.disposed) {
        return { ok: false, reason: 'Store is disposed.' };
      }

      for (const event of queue.splice(0, queue.length)) {
        applyEvent(event);
      }

      ensureSurfaceSize(surface);
      surface.clear({ x: 0, y: 0, width: state.size.width, height: state.size.height });
      state.field.draw(surface);
      state.field.update();
      state.tickCount += 1;
      emit();
      return { ok: true };
    },

    dispose(): void {
      if (state.disposed) {
        return;
      }
      state.disposed = true;
      queue.length = 0;
      listeners.clear();
      log.store('disposed after %d ticks', state.tickCount);
    }
  };

  return store;
}
