/// <reference types="vite/client" />

interface ImportMetaEnv {
  /** Scheduler period in milliseconds. */
  readonly VITE_TICK_INTERVAL_MS?: string;
  readonly VITE_BANNER_DURATION_MS?: string;
  readonly VITE_RESET_KEY?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
