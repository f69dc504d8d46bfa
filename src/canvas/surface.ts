// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import type { Canvas2DSurface } from '../internalTypes';
import { ImagePaintingError } from '../errors';

//////////////////////////////////////////////////////////////////////////////////////

const clampPositiveInteger = (value: number): number => {
  if (!Number.isFinite(value) || value <= 0) {
    return 1;
  }
  return Math.max(1, Math.ceil(value));
};

/**
 * Creates an offscreen 2D surface with `OffscreenCanvas` or a detached canvas element.
 * @param width Surface width in pixels.
 * @param height Surface height in pixels.
 * @returns Surface, or `null` outside a browser-like environment.
 */
export const createDefaultCanvas2DSurface = (
  width: number,
  height: number
): Canvas2DSurface | null => {
  const pixelWidth = clampPositiveInteger(width);
  const pixelHeight = clampPositiveInteger(height);

  if (typeof OffscreenCanvas !== 'undefined') {
    const canvas = new OffscreenCanvas(pixelWidth, pixelHeight);
    const ctx = canvas.getContext('2d');
    if (!ctx) {
      throw new ImagePaintingError(
        'Failed to acquire 2D context for an offscreen surface.',
        'surface-unavailable'
      );
    }
    return { canvas, ctx };
  }

  if (typeof document !== 'undefined') {
    const canvas = document.createElement('canvas');
    canvas.width = pixelWidth;
    canvas.height = pixelHeight;
    const ctx = canvas.getContext('2d');
    if (!ctx) {
      throw new ImagePaintingError(
        'Failed to acquire 2D context for an offscreen surface.',
        'surface-unavailable'
      );
    }
    return { canvas, ctx };
  }

  return null;
};
