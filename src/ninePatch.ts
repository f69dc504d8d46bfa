// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import type { Rect, Size } from './types';
import { rectBottom, rectFromLTRB, rectRight } from './utils/geometry';

//////////////////////////////////////////////////////////////////////////////////////

/**
 * Source and destination of one nine-patch cell.
 */
export interface NinePatchSlice {
  readonly source: Rect;
  readonly destination: Rect;
}

interface AxisStops {
  readonly source: readonly [number, number, number, number];
  readonly destination: readonly [number, number, number, number];
}

const clamp = (value: number, min: number, max: number): number =>
  Math.min(max, Math.max(min, value));

/**
 * Splits one axis into its three spans.
 * Fixed borders shrink proportionally when the destination cannot hold both.
 */
const computeAxisStops = (
  imageExtent: number,
  centerStart: number,
  centerEnd: number,
  destinationStart: number,
  destinationExtent: number
): AxisStops => {
  const start = clamp(centerStart, 0, imageExtent);
  const end = clamp(centerEnd, start, imageExtent);
  const leading = start;
  const trailing = imageExtent - end;
  const fixed = leading + trailing;

  let destinationLeading = leading;
  let destinationTrailing = trailing;
  if (fixed > destinationExtent) {
    const ratio = fixed > 0 ? Math.max(0, destinationExtent) / fixed : 0;
    destinationLeading = leading * ratio;
    destinationTrailing = trailing * ratio;
  }

  const destinationEnd = destinationStart + Math.max(0, destinationExtent);
  return {
    source: [0, start, end, imageExtent],
    destination: [
      destinationStart,
      destinationStart + destinationLeading,
      destinationEnd - destinationTrailing,
      destinationEnd,
    ],
  };
};

/**
 * Computes the nine cells of a nine-patch draw.
 * @param imageSize Image size in image pixels.
 * @param centerSlice Center region in image pixels.
 * @param destination Rectangle covered by the whole patch.
 * @returns Cells in row-major order, omitting cells without area.
 */
export const computeNinePatchSlices = (
  imageSize: Size,
  centerSlice: Rect,
  destination: Rect
): NinePatchSlice[] => {
  const horizontal = computeAxisStops(
    imageSize.width,
    centerSlice.left,
    rectRight(centerSlice),
    destination.left,
    destination.width
  );
  const vertical = computeAxisStops(
    imageSize.height,
    centerSlice.top,
    rectBottom(centerSlice),
    destination.top,
    destination.height
  );

  const slices: NinePatchSlice[] = [];
  for (let row = 0; row < 3; row++) {
    const sourceTop = vertical.source[row];
    const sourceBottom = vertical.source[row + 1];
    const destinationTop = vertical.destination[row];
    const destinationBottom = vertical.destination[row + 1];
    if (sourceBottom <= sourceTop || destinationBottom <= destinationTop) {
      continue;
    }
    for (let column = 0; column < 3; column++) {
      const sourceLeft = horizontal.source[column];
      const sourceRight = horizontal.source[column + 1];
      const destinationLeft = horizontal.destination[column];
      const destinationRight = horizontal.destination[column + 1];
      if (sourceRight <= sourceLeft || destinationRight <= destinationLeft) {
        continue;
      }
      slices.push({
        source: rectFromLTRB(sourceLeft, sourceTop, sourceRight, sourceBottom),
        destination: rectFromLTRB(
          destinationLeft,
          destinationTop,
          destinationRight,
          destinationBottom
        ),
      });
    }
  }
  return slices;
};
