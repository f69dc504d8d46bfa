// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import type { Alignment, BlendMode } from './types';
import type { ResolvedCompositeOperation, RgbaColor } from './internalTypes';

//////////////////////////////////////////////////////////////////////////////////////

/** Prefix attached to every console message emitted by this library. */
export const LOG_PREFIX = '[canvas-blend-painter]';

//////////////////////////////////////////////////////////////////////////////////////

export const ALIGNMENT_TOP_LEFT: Alignment = { x: -1.0, y: -1.0 } as const;
export const ALIGNMENT_TOP_CENTER: Alignment = { x: 0.0, y: -1.0 } as const;
export const ALIGNMENT_TOP_RIGHT: Alignment = { x: 1.0, y: -1.0 } as const;
export const ALIGNMENT_CENTER_LEFT: Alignment = { x: -1.0, y: 0.0 } as const;
export const ALIGNMENT_CENTER: Alignment = { x: 0.0, y: 0.0 } as const;
export const ALIGNMENT_CENTER_RIGHT: Alignment = { x: 1.0, y: 0.0 } as const;
export const ALIGNMENT_BOTTOM_LEFT: Alignment = { x: -1.0, y: 1.0 } as const;
export const ALIGNMENT_BOTTOM_CENTER: Alignment = { x: 0.0, y: 1.0 } as const;
export const ALIGNMENT_BOTTOM_RIGHT: Alignment = { x: 1.0, y: 1.0 } as const;

//////////////////////////////////////////////////////////////////////////////////////

/**
 * Bytes per decoded pixel (RGBA8).
 * @constant
 */
export const BYTES_PER_PIXEL = 4;

/**
 * Mipmap chain overhead factor applied to decoded image sizes.
 * @constant
 */
export const MIPMAP_OVERHEAD = 4 / 3;

/** Default allowance (bytes) before a decoded image counts as oversized. */
export const DEFAULT_IMAGE_OVERHEAD_ALLOWANCE = 128 * 1024;

//////////////////////////////////////////////////////////////////////////////////////

/**
 * Identity 5x4 color matrix.
 * @constant
 */
export const IDENTITY_COLOR_MATRIX: readonly number[] = [
  1, 0, 0, 0, 0, 0, 1, 0, 0, 0, 0, 0, 1, 0, 0, 0, 0, 0, 1, 0,
] as const;

/**
 * 5x4 color matrix that inverts RGB and keeps alpha.
 * @constant
 */
export const INVERT_COLOR_MATRIX: readonly number[] = [
  -1, 0, 0, 0, 255, 0, -1, 0, 0, 255, 0, 0, -1, 0, 255, 0, 0, 0, 1, 0,
] as const;

/** Number of entries in a 5x4 color matrix. */
export const COLOR_MATRIX_LENGTH = 20;

//////////////////////////////////////////////////////////////////////////////////////

const exact = (
  operation: GlobalCompositeOperation | null
): ResolvedCompositeOperation => ({ operation, exact: true });

const approximate = (
  operation: GlobalCompositeOperation
): ResolvedCompositeOperation => ({ operation, exact: false });

/**
 * Canvas 2D composite operation for each blend mode.
 * `clear` erases only where the source covers, and `modulate` blends alpha as `multiply` does.
 */
export const BLEND_MODE_COMPOSITE_OPERATIONS: Readonly<
  Record<BlendMode, ResolvedCompositeOperation>
> = {
  clear: approximate('destination-out'),
  src: exact('copy'),
  dst: exact(null),
  'src-over': exact('source-over'),
  'dst-over': exact('destination-over'),
  'src-in': exact('source-in'),
  'dst-in': exact('destination-in'),
  'src-out': exact('source-out'),
  'dst-out': exact('destination-out'),
  'src-atop': exact('source-atop'),
  'dst-atop': exact('destination-atop'),
  xor: exact('xor'),
  plus: exact('lighter'),
  modulate: approximate('multiply'),
  screen: exact('screen'),
  overlay: exact('overlay'),
  darken: exact('darken'),
  lighten: exact('lighten'),
  'color-dodge': exact('color-dodge'),
  'color-burn': exact('color-burn'),
  'hard-light': exact('hard-light'),
  'soft-light': exact('soft-light'),
  difference: exact('difference'),
  exclusion: exact('exclusion'),
  multiply: exact('multiply'),
  hue: exact('hue'),
  saturation: exact('saturation'),
  color: exact('color'),
  luminosity: exact('luminosity'),
} as const;

/**
 * Composite operations that also change destination pixels the source does not cover.
 */
export const UNBOUNDED_COMPOSITE_OPERATIONS: ReadonlySet<GlobalCompositeOperation> =
  new Set<GlobalCompositeOperation>([
    'copy',
    'source-in',
    'source-out',
    'destination-in',
    'destination-atop',
  ]);

//////////////////////////////////////////////////////////////////////////////////////

const __CSS_KEYWORD_COLORS = {
  black: [0, 0, 0, 1] as RgbaColor,
  silver: [192 / 255, 192 / 255, 192 / 255, 1] as RgbaColor,
  gray: [128 / 255, 128 / 255, 128 / 255, 1] as RgbaColor,
  white: [1, 1, 1, 1] as RgbaColor,
  maroon: [128 / 255, 0, 0, 1] as RgbaColor,
  red: [1, 0, 0, 1] as RgbaColor,
  purple: [128 / 255, 0, 128 / 255, 1] as RgbaColor,
  fuchsia: [1, 0, 1, 1] as RgbaColor,
  green: [0, 128 / 255, 0, 1] as RgbaColor,
  lime: [0, 1, 0, 1] as RgbaColor,
  olive: [128 / 255, 128 / 255, 0, 1] as RgbaColor,
  yellow: [1, 1, 0, 1] as RgbaColor,
  navy: [0, 0, 128 / 255, 1] as RgbaColor,
  blue: [0, 0, 1, 1] as RgbaColor,
  teal: [0, 128 / 255, 128 / 255, 1] as RgbaColor,
  aqua: [0, 1, 1, 1] as RgbaColor,
  transparent: [0, 0, 0, 0] as RgbaColor,
};

export const CSS_KEYWORD_COLORS: typeof __CSS_KEYWORD_COLORS &
  Record<string, RgbaColor | undefined> = __CSS_KEYWORD_COLORS;

/** Color used when a filter color cannot be parsed. */
export const FALLBACK_FILTER_COLOR: RgbaColor = CSS_KEYWORD_COLORS.transparent;
