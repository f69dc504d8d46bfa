// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import type { PaintableImage } from './types';

//////////////////////////////////////////////////////////////////////////////////////////

/** Normalized RGBA, each channel in 0..1. */
export type RgbaColor = readonly [number, number, number, number];

/**
 * 2D canvas rendering context driven by the Canvas 2D backend.
 */
export type Canvas2DContext =
  | CanvasRenderingContext2D
  | OffscreenCanvasRenderingContext2D;

/**
 * Canvas sources used as offscreen surfaces.
 */
export type Canvas2DSource = HTMLCanvasElement | OffscreenCanvas;

/**
 * Offscreen drawing surface.
 */
export interface Canvas2DSurface {
  readonly canvas: Canvas2DSource;
  readonly ctx: Canvas2DContext;
}

/**
 * Factory of offscreen surfaces of the given pixel size.
 */
export type Canvas2DSurfaceFactory = (
  width: number,
  height: number
) => Canvas2DSurface | null;

//////////////////////////////////////////////////////////////////////////////////////////

/**
 * Bitmap shared by every clone of an image handle.
 */
export interface SharedImageHandle<TImage extends PaintableImage> {
  readonly image: TImage;
  /** Live handles; the bitmap is closed when it reaches zero. */
  refCount: number;
}

/**
 * Composite operation resolved for a blend mode.
 */
export interface ResolvedCompositeOperation {
  /** `null` leaves the destination untouched. */
  readonly operation: GlobalCompositeOperation | null;
  /** False when the Canvas 2D operation only approximates the blend mode. */
  readonly exact: boolean;
}
