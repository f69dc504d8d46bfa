// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

/**
 * Color parsing for mode color filters.
 * Accepts keywords, `#rgb`, `#rgba`, `#rrggbb`, `#rrggbbaa`, and `rgb()`/`rgba()`
 * in both the comma and the space separated forms.
 */

import { CSS_KEYWORD_COLORS } from '../const';
import type { RgbaColor } from '../internalTypes';

//////////////////////////////////////////////////////////////////////////////////////////

const HEX_COLOR_PATTERN = /^#([0-9a-f]{3,4}|[0-9a-f]{6}|[0-9a-f]{8})$/;
const RGB_FUNCTION_PATTERN = /^rgba?\(([^)]*)\)$/;
const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/;

const clampUnit = (value: number): number => Math.min(1, Math.max(0, value));

/**
 * Reads `n` or `n%` into 0..1, where `n` is scaled by `max`.
 * @returns NaN when the token is not a number.
 */
const parseComponent = (token: string, max: number): number => {
  const percent = token.endsWith('%');
  const text = percent ? token.slice(0, -1) : token;
  if (!NUMBER_PATTERN.test(text)) {
    return Number.NaN;
  }
  const value = Number(text);
  return clampUnit(percent ? value / 100 : value / max);
};

const parseHexColor = (hex: string): RgbaColor => {
  const digits =
    hex.length <= 4 ? hex.replace(/./g, (digit) => digit + digit) : hex;
  const channel = (index: number) =>
    parseInt(digits.slice(index * 2, index * 2 + 2), 16) / 255;
  return [
    channel(0),
    channel(1),
    channel(2),
    digits.length === 8 ? channel(3) : 1,
  ];
};

const parseRgbFunction = (body: string): RgbaColor | null => {
  const tokens = body.trim().split(/\s*[,/]\s*|\s+/);
  if (tokens.length !== 3 && tokens.length !== 4) {
    return null;
  }
  const [r, g, b, a] = tokens.map((token, index) =>
    parseComponent(token, index < 3 ? 255 : 1)
  );
  if (
    r === undefined ||
    g === undefined ||
    b === undefined ||
    [r, g, b, a].some((value) => Number.isNaN(value))
  ) {
    return null;
  }
  return [r, g, b, a ?? 1];
};

//////////////////////////////////////////////////////////////////////////////////////////

/**
 * Parses a CSS color into normalized RGBA.
 * @returns `null` when the color is not understood.
 */
export const parseCssColor = (color: string): RgbaColor | null => {
  const value = color.trim().toLowerCase();
  if (Object.prototype.hasOwnProperty.call(CSS_KEYWORD_COLORS, value)) {
    return CSS_KEYWORD_COLORS[value] ?? null;
  }
  const hex = HEX_COLOR_PATTERN.exec(value);
  if (hex) {
    return parseHexColor(hex[1] ?? '');
  }
  const rgb = RGB_FUNCTION_PATTERN.exec(value);
  return rgb ? parseRgbFunction(rgb[1] ?? '') : null;
};
