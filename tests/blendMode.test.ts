// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  BLEND_MODES,
  isBlendMode,
  resolveCompositeOperation,
} from '../src/blendMode';
import { resetLoggedWarnings } from '../src/utils/logging';

describe('blend modes', () => {
  beforeEach(() => {
    resetLoggedWarnings();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('lists every blend mode', () => {
    expect(BLEND_MODES).toHaveLength(29);
    expect(BLEND_MODES[0]).toBe('clear');
    expect(BLEND_MODES).toContain('luminosity');
  });

  it('recognizes only own blend mode names', () => {
    expect(isBlendMode('src-over')).toBe(true);
    expect(isBlendMode('source-over')).toBe(false);
    expect(isBlendMode('toString')).toBe(false);
  });

  it('maps Porter-Duff and separable modes to composite operations', () => {
    expect(resolveCompositeOperation('src')).toEqual({
      operation: 'copy',
      exact: true,
    });
    expect(resolveCompositeOperation('plus')).toEqual({
      operation: 'lighter',
      exact: true,
    });
    expect(resolveCompositeOperation('color-dodge').operation).toBe(
      'color-dodge'
    );
    expect(resolveCompositeOperation('dst')).toEqual({
      operation: null,
      exact: true,
    });
  });

  it('warns once for approximated modes', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    expect(resolveCompositeOperation('modulate')).toEqual({
      operation: 'multiply',
      exact: false,
    });
    resolveCompositeOperation('modulate');
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      '[canvas-blend-painter] Blend mode "modulate" is approximated with "multiply" on Canvas 2D.'
    );
  });
});
