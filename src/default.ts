// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import type {
  FilterQuality,
  ImagePaintingDebugSettings,
  ImageRepeat,
} from './types';
import { DEFAULT_IMAGE_OVERHEAD_ALLOWANCE } from './const';

//////////////////////////////////////////////////////////////////////////////////////////

/**
 * Debug settings used until {@link configureImagePaintingDebug} changes them.
 */
export const DEFAULT_IMAGE_PAINTING_DEBUG_SETTINGS: Readonly<ImagePaintingDebugSettings> =
  {
    trackImageSizes: true,
    invertOversizedImages: false,
    imageOverheadAllowance: DEFAULT_IMAGE_OVERHEAD_ALLOWANCE,
    onPaintImage: undefined,
  } as const;

//////////////////////////////////////////////////////////////////////////////////////////

/** Bilinear sampling. */
export const DEFAULT_FILTER_QUALITY: FilterQuality = 'low';

export const DEFAULT_IMAGE_REPEAT: ImageRepeat = 'no-repeat';

export const DEFAULT_IMAGE_SCALE = 1.0;

export const DEFAULT_IMAGE_OPACITY = 1.0;

export const DEFAULT_DEVICE_PIXEL_RATIO = 1.0;
