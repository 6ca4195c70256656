import type { FieldOptions } from './types';

export const DEFAULT_FIELD_OPTIONS: FieldOptions = {
  tickIntervalMs: 30,
  bannerDurationMs: 3000,
  resetKey: 'r'
};

function positiveOr(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) && value > 0 ? value : fallback;
}

export function resolveFieldOptions(opts: Partial<FieldOptions> = {}): FieldOptions {
  const resetKey = opts.resetKey?.trim().toLowerCase();
  return {
    tickIntervalMs: positiveOr(opts.tickIntervalMs, DEFAULT_FIELD_OPTIONS.tickIntervalMs),
    bannerDurationMs: positiveOr(opts.bannerDurationMs, DEFAULT_FIELD_OPTIONS.bannerDurationMs),
    resetKey: resetKey ? resetKey : DEFAULT_FIELD_OPTIONS.resetKey
  };
}

function readNumber(value: unknown): number | undefined {
  if (typeof value !== 'string' || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function optionsFromEnv(env: Record<string, unknown>): Partial<FieldOptions> {
  const opts: Partial<FieldOptions> = {};
  const tickIntervalMs = readNumber(env.VITE_TICK_INTERVAL_MS);
  const bannerDurationMs = readNumber(env.VITE_BANNER_DURATION_MS);
  if (tickIntervalMs !== undefined) {
    opts.tickIntervalMs = tickIntervalMs;
  }
  if (bannerDurationMs !== undefined) {
    opts.bannerDurationMs = bannerDurationMs;
  }
  if (typeof env.VITE_RESET_KEY === 'string') {
    opts.resetKey = env.VITE_RESET_KEY;
  }
  return opts;
}
