// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

export * from './types';
export * from './default';
export {
  ALIGNMENT_TOP_LEFT,
  ALIGNMENT_TOP_CENTER,
  ALIGNMENT_TOP_RIGHT,
  ALIGNMENT_CENTER_LEFT,
  ALIGNMENT_CENTER,
  ALIGNMENT_CENTER_RIGHT,
  ALIGNMENT_BOTTOM_LEFT,
  ALIGNMENT_BOTTOM_CENTER,
  ALIGNMENT_BOTTOM_RIGHT,
  IDENTITY_COLOR_MATRIX,
  INVERT_COLOR_MATRIX,
} from './const';
export { ImagePaintingError, type ImagePaintingErrorCode } from './errors';
export {
  configureImagePaintingDebug,
  getImagePaintingDebugSettings,
  resetImagePaintingDebugSettings,
} from './config';
export * from './utils/geometry';
export * from './boxFit';
export * from './alignment';
export * from './tiling';
export * from './ninePatch';
export {
  BLEND_MODES,
  isBlendMode,
  resolveCompositeOperation,
} from './blendMode';
export {
  LINEAR_TO_SRGB_GAMMA,
  SRGB_TO_LINEAR_GAMMA,
  INVERT_COLOR_FILTER,
  createModeColorFilter,
  createMatrixColorFilter,
  composeColorMatrices,
  applyColorFilterToPixels,
} from './colorFilter';
export * from './canvas/path';
export * from './canvas/recordingCanvas';
export {
  createCanvas2DPaintCanvas,
  type Canvas2DImage,
  type Canvas2DPaintCanvasOptions,
} from './canvas/canvas2d';
export type {
  Canvas2DContext,
  Canvas2DSurface,
  Canvas2DSurfaceFactory,
} from './internalTypes';
export * from './imageSizeInfo';
export * from './paintImage';
export * from './imageStream';
export * from './decorationImage';
