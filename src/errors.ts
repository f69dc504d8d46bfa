// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

//////////////////////////////////////////////////////////////////////////////////////

export type ImagePaintingErrorCode =
  | 'text-direction-missing'
  | 'image-disposed'
  | 'painter-disposed'
  | 'invalid-center-slice'
  | 'center-slice-clipped'
  | 'invalid-color-matrix'
  | 'surface-unavailable'
  | 'unbalanced-restore';

/**
 * Error raised when an image cannot be painted with the given arguments.
 */
export class ImagePaintingError extends Error implements Error {
  readonly code: ImagePaintingErrorCode;

  constructor(message: string, code: ImagePaintingErrorCode) {
    super(message);
    this.name = 'ImagePaintingError';
    this.code = code;
  }
}
