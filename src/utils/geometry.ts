// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import type { Offset, Rect, Size } from '../types';

//////////////////////////////////////////////////////////////////////////////////////

export const ZERO_SIZE: Size = { width: 0, height: 0 } as const;

export const ZERO_OFFSET: Offset = { x: 0, y: 0 } as const;

export const createSize = (width: number, height: number): Size => ({
  width,
  height,
});

export const createRect = (
  left: number,
  top: number,
  width: number,
  height: number
): Rect => ({ left, top, width, height });

export const rectFromLTRB = (
  left: number,
  top: number,
  right: number,
  bottom: number
): Rect => ({ left, top, width: right - left, height: bottom - top });

export const rectFromOffsetAndSize = (offset: Offset, size: Size): Rect => ({
  left: offset.x,
  top: offset.y,
  width: size.width,
  height: size.height,
});

export const rectRight = (rect: Rect): number => rect.left + rect.width;

export const rectBottom = (rect: Rect): number => rect.top + rect.height;

export const rectSize = (rect: Rect): Size => ({
  width: rect.width,
  height: rect.height,
});

export const rectCenter = (rect: Rect): Offset => ({
  x: rect.left + rect.width / 2.0,
  y: rect.top + rect.height / 2.0,
});

/**
 * True when the rectangle encloses no area. NaN extents count as empty.
 */
export const isRectEmpty = (rect: Rect): boolean =>
  !(rect.width > 0 && rect.height > 0);

export const isSizeEmpty = (size: Size): boolean =>
  !(size.width > 0 && size.height > 0);

export const shiftRect = (rect: Rect, dx: number, dy: number): Rect => ({
  left: rect.left + dx,
  top: rect.top + dy,
  width: rect.width,
  height: rect.height,
});

/**
 * Multiplies every edge of the rectangle by `scale`.
 */
export const scaleRect = (rect: Rect, scale: number): Rect =>
  rectFromLTRB(
    rect.left * scale,
    rect.top * scale,
    rectRight(rect) * scale,
    rectBottom(rect) * scale
  );

export const scaleSize = (size: Size, scale: number): Size => ({
  width: size.width * scale,
  height: size.height * scale,
});

export const divideSize = (size: Size, divisor: number): Size => ({
  width: size.width / divisor,
  height: size.height / divisor,
});

export const addSize = (a: Size, b: Size): Size => ({
  width: a.width + b.width,
  height: a.height + b.height,
});

export const subtractSize = (a: Size, b: Size): Size => ({
  width: a.width - b.width,
  height: a.height - b.height,
});

export const sizesEqual = (a: Size, b: Size): boolean =>
  a.width === b.width && a.height === b.height;

export const rectsEqual = (a: Rect, b: Rect): boolean =>
  a.left === b.left &&
  a.top === b.top &&
  a.width === b.width &&
  a.height === b.height;

/**
 * Intersection of two rectangles, or `null` when they do not overlap.
 */
export const intersectRects = (a: Rect, b: Rect): Rect | null => {
  const left = Math.max(a.left, b.left);
  const top = Math.max(a.top, b.top);
  const right = Math.min(rectRight(a), rectRight(b));
  const bottom = Math.min(rectBottom(a), rectBottom(b));
  if (right <= left || bottom <= top) {
    return null;
  }
  return rectFromLTRB(left, top, right, bottom);
};
