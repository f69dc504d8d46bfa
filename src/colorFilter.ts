// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import type {
  BlendMode,
  ColorFilter,
  ImagePaint,
  LinearToSrgbGammaColorFilter,
  MatrixColorFilter,
  ModeColorFilter,
  SrgbToLinearGammaColorFilter,
} from './types';
import {
  COLOR_MATRIX_LENGTH,
  FALLBACK_FILTER_COLOR,
  INVERT_COLOR_MATRIX,
} from './const';
import type { RgbaColor } from './internalTypes';
import { ImagePaintingError } from './errors';
import { parseCssColor } from './utils/color';
import { logWarningOnce } from './utils/logging';

//////////////////////////////////////////////////////////////////////////////////////

export const LINEAR_TO_SRGB_GAMMA: LinearToSrgbGammaColorFilter = {
  type: 'linear-to-srgb-gamma',
} as const;

export const SRGB_TO_LINEAR_GAMMA: SrgbToLinearGammaColorFilter = {
  type: 'srgb-to-linear-gamma',
} as const;

/**
 * Filter that inverts RGB channels.
 */
export const INVERT_COLOR_FILTER: MatrixColorFilter = {
  type: 'matrix',
  matrix: INVERT_COLOR_MATRIX,
} as const;

export const createModeColorFilter = (
  color: string,
  blendMode: BlendMode
): ModeColorFilter => ({ type: 'mode', color, blendMode });

/**
 * Creates a matrix color filter.
 * @param matrix 20 entries, 5x4 row-major.
 * @throws ImagePaintingError when the matrix is malformed.
 */
export const createMatrixColorFilter = (
  matrix: readonly number[]
): MatrixColorFilter => {
  if (
    matrix.length !== COLOR_MATRIX_LENGTH ||
    !matrix.every((value) => Number.isFinite(value))
  ) {
    throw new ImagePaintingError(
      `Color matrix requires ${COLOR_MATRIX_LENGTH} finite values, got ${matrix.length}.`,
      'invalid-color-matrix'
    );
  }
  return { type: 'matrix', matrix: [...matrix] };
};

/**
 * Composes two 5x4 color matrices.
 * @param outer Applied second.
 * @param inner Applied first.
 * @returns Matrix equivalent to applying `inner` then `outer`.
 */
export const composeColorMatrices = (
  outer: readonly number[],
  inner: readonly number[]
): number[] => {
  const result = new Array<number>(COLOR_MATRIX_LENGTH).fill(0);
  for (let row = 0; row < 4; row++) {
    for (let column = 0; column < 5; column++) {
      let value = column === 4 ? (outer[row * 5 + 4] ?? 0) : 0;
      for (let k = 0; k < 4; k++) {
        value += (outer[row * 5 + k] ?? 0) * (inner[k * 5 + column] ?? 0);
      }
      result[row * 5 + column] = value;
    }
  }
  return result;
};

/**
 * Color filters a paint applies, in order.
 */
export const resolvePaintColorFilters = (
  paint: Pick<ImagePaint, 'colorFilter' | 'invertColors'>
): ColorFilter[] => {
  const filters: ColorFilter[] = [];
  if (paint.colorFilter) {
    filters.push(paint.colorFilter);
  }
  if (paint.invertColors) {
    filters.push(INVERT_COLOR_FILTER);
  }
  return filters;
};

//////////////////////////////////////////////////////////////////////////////////////

const clampByte = (value: number): number =>
  Math.min(255, Math.max(0, Math.round(value)));

const linearToSrgb = (value: number): number =>
  value <= 0.0031308
    ? value * 12.92
    : 1.055 * Math.pow(value, 1 / 2.4) - 0.055;

const srgbToLinear = (value: number): number =>
  value <= 0.04045 ? value / 12.92 : Math.pow((value + 0.055) / 1.055, 2.4);

const applyMatrix = (pixels: Uint8ClampedArray, m: readonly number[]) => {
  for (let i = 0; i < pixels.length; i += 4) {
    const r = pixels[i] ?? 0;
    const g = pixels[i + 1] ?? 0;
    const b = pixels[i + 2] ?? 0;
    const a = pixels[i + 3] ?? 0;
    for (let row = 0; row < 4; row++) {
      const base = row * 5;
      pixels[i + row] = clampByte(
        (m[base] ?? 0) * r +
          (m[base + 1] ?? 0) * g +
          (m[base + 2] ?? 0) * b +
          (m[base + 3] ?? 0) * a +
          (m[base + 4] ?? 0)
      );
    }
  }
};

const applyTransfer = (
  pixels: Uint8ClampedArray,
  transfer: (value: number) => number
) => {
  for (let i = 0; i < pixels.length; i += 4) {
    for (let channel = 0; channel < 3; channel++) {
      pixels[i + channel] = clampByte(
        transfer((pixels[i + channel] ?? 0) / 255) * 255
      );
    }
  }
};

/** Blends one premultiplied color channel. */
type ChannelBlend = (sc: number, sa: number, dc: number, da: number) => number;

/** Resulting alpha of a blend. */
type AlphaBlend = (sa: number, da: number) => number;

const srcOverAlpha: AlphaBlend = (sa, da) => sa + da - sa * da;

interface PixelBlend {
  readonly channel: ChannelBlend;
  readonly alpha: AlphaBlend;
}

const porterDuff = (
  fs: (sa: number, da: number) => number,
  fd: (sa: number, da: number) => number
): PixelBlend => ({
  channel: (sc, sa, dc, da) => sc * fs(sa, da) + dc * fd(sa, da),
  alpha: (sa, da) => sa * fs(sa, da) + da * fd(sa, da),
});

const SRC_OVER_BLEND = porterDuff(
  () => 1,
  (sa) => 1 - sa
);

const PIXEL_BLENDS: Partial<Record<BlendMode, PixelBlend>> = {
  clear: porterDuff(
    () => 0,
    () => 0
  ),
  src: porterDuff(
    () => 1,
    () => 0
  ),
  dst: porterDuff(
    () => 0,
    () => 1
  ),
  'src-over': SRC_OVER_BLEND,
  'dst-over': porterDuff(
    (_, da) => 1 - da,
    () => 1
  ),
  'src-in': porterDuff(
    (_, da) => da,
    () => 0
  ),
  'dst-in': porterDuff(
    () => 0,
    (sa) => sa
  ),
  'src-out': porterDuff(
    (_, da) => 1 - da,
    () => 0
  ),
  'dst-out': porterDuff(
    () => 0,
    (sa) => 1 - sa
  ),
  'src-atop': porterDuff(
    (_, da) => da,
    (sa) => 1 - sa
  ),
  'dst-atop': porterDuff(
    (_, da) => 1 - da,
    (sa) => sa
  ),
  xor: porterDuff(
    (_, da) => 1 - da,
    (sa) => 1 - sa
  ),
  plus: {
    channel: (sc, _sa, dc) => Math.min(1, sc + dc),
    alpha: (sa, da) => Math.min(1, sa + da),
  },
  modulate: {
    channel: (sc, _sa, dc) => sc * dc,
    alpha: (sa, da) => sa * da,
  },
  multiply: {
    channel: (sc, sa, dc, da) => sc * dc + sc * (1 - da) + dc * (1 - sa),
    alpha: srcOverAlpha,
  },
  screen: {
    channel: (sc, _sa, dc) => sc + dc - sc * dc,
    alpha: srcOverAlpha,
  },
  darken: {
    channel: (sc, sa, dc, da) => sc + dc - Math.max(sc * da, dc * sa),
    alpha: srcOverAlpha,
  },
  lighten: {
    channel: (sc, sa, dc, da) => sc + dc - Math.min(sc * da, dc * sa),
    alpha: srcOverAlpha,
  },
  difference: {
    channel: (sc, sa, dc, da) => sc + dc - 2 * Math.min(sc * da, dc * sa),
    alpha: srcOverAlpha,
  },
};

const resolvePixelBlend = (mode: BlendMode): PixelBlend => {
  const blend = PIXEL_BLENDS[mode];
  if (blend) {
    return blend;
  }
  logWarningOnce(
    `color-filter-mode:${mode}`,
    `Color filter blend mode "${mode}" is not supported; "src-over" is used instead.`
  );
  return SRC_OVER_BLEND;
};

const resolveModeColor = (color: string): RgbaColor => {
  const parsed = parseCssColor(color);
  if (parsed) {
    return parsed;
  }
  logWarningOnce(
    `filter-color:${color}`,
    `Color filter color "${color}" could not be parsed, painting it as transparent.`
  );
  return FALLBACK_FILTER_COLOR;
};

const applyMode = (pixels: Uint8ClampedArray, filter: ModeColorFilter) => {
  const [sr, sg, sb, sa] = resolveModeColor(filter.color);
  const blend = resolvePixelBlend(filter.blendMode);
  const source = [sr * sa, sg * sa, sb * sa];
  for (let i = 0; i < pixels.length; i += 4) {
    const da = (pixels[i + 3] ?? 0) / 255;
    const alpha = blend.alpha(sa, da);
    for (let channel = 0; channel < 3; channel++) {
      const dc = ((pixels[i + channel] ?? 0) / 255) * da;
      const premultiplied = blend.channel(source[channel] ?? 0, sa, dc, da);
      pixels[i + channel] =
        alpha > 0 ? clampByte((premultiplied / alpha) * 255) : 0;
    }
    pixels[i + 3] = clampByte(alpha * 255);
  }
};

/**
 * Applies a color filter to RGBA8 pixels in place.
 * @param pixels Un-premultiplied RGBA8 pixels, as found in `ImageData`.
 * @param filter Filter to apply.
 */
export const applyColorFilterToPixels = (
  pixels: Uint8ClampedArray,
  filter: ColorFilter
): void => {
  switch (filter.type) {
    case 'matrix':
      applyMatrix(pixels, filter.matrix);
      break;
    case 'mode':
      applyMode(pixels, filter);
      break;
    case 'linear-to-srgb-gamma':
      applyTransfer(pixels, linearToSrgb);
      break;
    case 'srgb-to-linear-gamma':
      applyTransfer(pixels, srgbToLinear);
      break;
  }
};
