// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import type { BlendMode } from './types';
import type { ResolvedCompositeOperation } from './internalTypes';
import { BLEND_MODE_COMPOSITE_OPERATIONS } from './const';
import { logWarningOnce } from './utils/logging';

//////////////////////////////////////////////////////////////////////////////////////

export const isBlendMode = (value: string): value is BlendMode =>
  Object.prototype.hasOwnProperty.call(BLEND_MODE_COMPOSITE_OPERATIONS, value);

/**
 * Every supported blend mode.
 */
export const BLEND_MODES: readonly BlendMode[] = Object.keys(
  BLEND_MODE_COMPOSITE_OPERATIONS
).filter(isBlendMode);

/**
 * Maps a blend mode to a Canvas 2D composite operation.
 * @param mode Blend mode.
 * @returns Composite operation; `operation` is `null` for `dst`, whose draws change nothing.
 * @remarks Approximated modes log a warning the first time they are resolved.
 */
export const resolveCompositeOperation = (
  mode: BlendMode
): ResolvedCompositeOperation => {
  const resolved = BLEND_MODE_COMPOSITE_OPERATIONS[mode];
  if (!resolved.exact) {
    logWarningOnce(
      `blend-mode:${mode}`,
      `Blend mode "${mode}" is approximated with "${resolved.operation ?? 'none'}" on Canvas 2D.`
    );
  }
  return resolved;
};
