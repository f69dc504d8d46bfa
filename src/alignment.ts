// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import type {
  Alignment,
  AlignmentDirectional,
  AlignmentGeometry,
  Offset,
  Rect,
  Size,
  TextDirection,
} from './types';
import { ImagePaintingError } from './errors';

//////////////////////////////////////////////////////////////////////////////////////

export const isAlignmentDirectional = (
  geometry: AlignmentGeometry
): geometry is AlignmentDirectional => 'start' in geometry;

/**
 * Resolves an alignment against a text direction.
 * @param geometry Plain or directional alignment.
 * @param textDirection Direction used by directional alignments.
 * @returns Plain alignment.
 * @throws ImagePaintingError when a directional alignment gets no direction.
 */
export const resolveAlignment = (
  geometry: AlignmentGeometry,
  textDirection: TextDirection | undefined
): Alignment => {
  if (!isAlignmentDirectional(geometry)) {
    return geometry;
  }
  if (textDirection === undefined) {
    throw new ImagePaintingError(
      'A directional alignment can only be resolved when a text direction is available.',
      'text-direction-missing'
    );
  }
  return {
    x: textDirection === 'rtl' ? -geometry.start : geometry.start,
    y: geometry.y,
  };
};

/**
 * Mirrors the horizontal component.
 */
export const flipAlignment = (alignment: Alignment): Alignment => ({
  x: -alignment.x,
  y: alignment.y,
});

/**
 * Point within a box of `size` the alignment designates, relative to its top left corner.
 */
export const alignmentAlongSize = (alignment: Alignment, size: Size): Offset => {
  const centerX = size.width / 2.0;
  const centerY = size.height / 2.0;
  return {
    x: centerX + alignment.x * centerX,
    y: centerY + alignment.y * centerY,
  };
};

/**
 * Places a box of `size` within `rect` at the alignment.
 * @param alignment Placement within `rect`.
 * @param size Size of the placed box.
 * @param rect Enclosing rectangle.
 * @returns Placed rectangle.
 */
export const inscribe = (
  alignment: Alignment,
  size: Size,
  rect: Rect
): Rect => {
  const halfWidthDelta = (rect.width - size.width) / 2.0;
  const halfHeightDelta = (rect.height - size.height) / 2.0;
  return {
    left: rect.left + halfWidthDelta + alignment.x * halfWidthDelta,
    top: rect.top + halfHeightDelta + alignment.y * halfHeightDelta,
    width: size.width,
    height: size.height,
  };
};
