// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import { LOG_PREFIX } from '../const';

//////////////////////////////////////////////////////////////////////////////////////

const warnedKeys = new Set<string>();

export const logWarning = (message: string, reason?: unknown): void => {
  if (typeof console !== 'undefined' && typeof console.warn === 'function') {
    if (reason === undefined) {
      console.warn(`${LOG_PREFIX} ${message}`);
    } else {
      console.warn(`${LOG_PREFIX} ${message}`, reason);
    }
  }
};

/**
 * Logs a warning only the first time `key` is seen.
 */
export const logWarningOnce = (
  key: string,
  message: string,
  reason?: unknown
): void => {
  if (warnedKeys.has(key)) {
    return;
  }
  warnedKeys.add(key);
  logWarning(message, reason);
};

export const logError = (message: string, reason?: unknown): void => {
  if (typeof console !== 'undefined' && typeof console.error === 'function') {
    console.error(`${LOG_PREFIX} ${message}`, reason);
  }
};

/** Forgets which one-time warnings were emitted. */
export const resetLoggedWarnings = (): void => {
  warnedKeys.clear();
};
