import { createRoot } from 'react-dom/client';

import App from './App';
import { log } from './model/log';
import { createFieldStore } from './model/store';
import type { FieldOptions } from './model/types';

/**
 * Mounts the app into `container` and tears it down when the page is really
 * unloaded. A `pagehide` for the back/forward cache keeps everything alive so
 * the animation resumes when the page is shown again.
 */
export function mountFieldApp(container: HTMLElement, options: Partial<FieldOptions> = {}): () => void {
  const store = createFieldStore({ width: window.innerWidth, height: window.innerHeight });
  const root = createRoot(container);
  let mounted = true;

  function teardown(): void {
    if (!mounted) {
      return;
    }
    mounted = false;
    window.removeEventListener('pagehide', handlePageHide);
    root.unmount();
    store.dispose();
  }

  function handlePageHide(event: PageTransitionEvent): void {
    if (event.persisted) {
      log.store('page cached, keeping store alive');
      return;
    }
    teardown();
  }

  window.addEventListener('pagehide', handlePageHide);
  root.render(<App store={store} options={options} />);
  return teardown;
}
