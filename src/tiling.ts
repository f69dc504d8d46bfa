// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import type { ImageRepeat, Rect } from './types';
import { rectBottom, rectRight, shiftRect } from './utils/geometry';

//////////////////////////////////////////////////////////////////////////////////////

const repeatsHorizontally = (repeat: ImageRepeat): boolean =>
  repeat === 'repeat' || repeat === 'repeat-x';

const repeatsVertically = (repeat: ImageRepeat): boolean =>
  repeat === 'repeat' || repeat === 'repeat-y';

/**
 * Generates the tile rectangles that cover `outputRect` by repeating `fundamentalRect`.
 * @param outputRect Area to cover.
 * @param fundamentalRect Placement of the untiled image.
 * @param repeat Repeat mode; `no-repeat` yields `fundamentalRect` only.
 * @returns Tiles ordered by column, then by row within a column.
 * @remarks Tiles may extend beyond `outputRect`; callers clip to it.
 */
export const generateImageTileRects = (
  outputRect: Rect,
  fundamentalRect: Rect,
  repeat: ImageRepeat
): Rect[] => {
  let startX = 0;
  let startY = 0;
  let stopX = 0;
  let stopY = 0;
  const strideX = fundamentalRect.width;
  const strideY = fundamentalRect.height;

  if (repeatsHorizontally(repeat) && strideX > 0) {
    startX = Math.floor((outputRect.left - fundamentalRect.left) / strideX);
    stopX = Math.ceil(
      (rectRight(outputRect) - rectRight(fundamentalRect)) / strideX
    );
  }

  if (repeatsVertically(repeat) && strideY > 0) {
    startY = Math.floor((outputRect.top - fundamentalRect.top) / strideY);
    stopY = Math.ceil(
      (rectBottom(outputRect) - rectBottom(fundamentalRect)) / strideY
    );
  }

  const tiles: Rect[] = [];
  for (let i = startX; i <= stopX; ++i) {
    for (let j = startY; j <= stopY; ++j) {
      tiles.push(shiftRect(fundamentalRect, i * strideX, j * strideY));
    }
  }
  return tiles;
};
