// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import type { ImagePaintingDebugSettings } from './types';
import { DEFAULT_IMAGE_PAINTING_DEBUG_SETTINGS } from './default';

//////////////////////////////////////////////////////////////////////////////////////

let debugSettings: ImagePaintingDebugSettings = {
  ...DEFAULT_IMAGE_PAINTING_DEBUG_SETTINGS,
};

/**
 * Overrides image painting debug settings.
 * @param settings Settings to change; omitted fields keep their current value.
 * @returns Settings in effect afterwards.
 */
export const configureImagePaintingDebug = (
  settings: Partial<ImagePaintingDebugSettings>
): Readonly<ImagePaintingDebugSettings> => {
  const next = { ...debugSettings, ...settings };
  if (
    !Number.isFinite(next.imageOverheadAllowance) ||
    next.imageOverheadAllowance < 0
  ) {
    next.imageOverheadAllowance = debugSettings.imageOverheadAllowance;
  }
  debugSettings = next;
  return debugSettings;
};

/**
 * Current image painting debug settings.
 */
export const getImagePaintingDebugSettings =
  (): Readonly<ImagePaintingDebugSettings> => debugSettings;

/**
 * Restores the default debug settings.
 */
export const resetImagePaintingDebugSettings = (): void => {
  debugSettings = { ...DEFAULT_IMAGE_PAINTING_DEBUG_SETTINGS };
};
