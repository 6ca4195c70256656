import { useEffect, useState } from 'react';

import { FieldCanvas } from './canvas/FieldCanvas';
import { resolveFieldOptions } from './model/config';
import { createFieldStore } from './model/store';
import type { FieldOptions, FieldStore } from './model/types';
import { ReloadBanner } from './ui/ReloadBanner';

type AppProps = {
  store?: FieldStore;
  options?: Partial<FieldOptions>;
};

function useStoreVersion(store: FieldStore): number {
  const [version, setVersion] = useState(0);

  useEffect(() => {
    return store.subscribe(() => {
      setVersion((previous) => previous + 1);
    });
  }, [store]);

  return version;
}

export default function App({ store, options }: AppProps): JSX.Element {
  const [localStore] = useState<FieldStore>(
    () => store ?? createFieldStore({ width: window.innerWidth, height: window.innerHeight })
  );
  const fieldStore = store ?? localStore;
  useStoreVersion(fieldStore);

  const { tickIntervalMs, bannerDurationMs, resetKey } = resolveFieldOptions(options);
  const state = fieldStore.getState();

  useEffect(() => {
    const onKeyDown = (event: KeyboardEvent): void => {
      if (!event.ctrlKey || event.key.toLowerCase() !== resetKey) {
        return;
      }
      event.preventDefault();
      fieldStore.reset();
    };

    window.addEventListener('keydown', onKeyDown);
    return () => {
      window.removeEventListener('keydown', onKeyDown);
    };
  }, [fieldStore, resetKey]);

  return (
    <div className="app-shell">
      <FieldCanvas store={fieldStore} tickIntervalMs={tickIntervalMs} />

      <ReloadBanner durationMs={bannerDurationMs} resetKey={resetKey} />

      <div className="statusbar" data-testid="statusbar">
        <span>
          Points: <strong data-testid="point-count">{state.field.points.length}</strong>
        </span>
        <span>
          Ticks: <strong data-testid="tick-count">{state.tickCount}</strong>
        </span>
        <span>
          Resets: <strong data-testid="reset-count">{state.resetCount}</strong>
        </span>
      </div>
    </div>
  );
}
