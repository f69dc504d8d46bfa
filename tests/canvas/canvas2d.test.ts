// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import { describe, expect, it } from 'vitest';

import {
  createCanvas2DPaintCanvas,
  type Canvas2DImage,
} from '../../src/canvas/canvas2d';
import { createRectPath } from '../../src/canvas/path';
import { INVERT_COLOR_FILTER } from '../../src/colorFilter';
import { ImagePaintingError } from '../../src/errors';
import type { ImagePaint } from '../../src/types';
import { createFakeContext, createFakeSurfaceFactory } from './fakeContext';

const createImage = (width: number, height: number): Canvas2DImage =>
  ({ width, height }) as unknown as Canvas2DImage;

const basePaint: ImagePaint = {
  blendMode: 'src-over',
  opacity: 1,
  filterQuality: 'low',
  invertColors: false,
  isAntiAlias: true,
};

const rect = (left: number, top: number, width: number, height: number) => ({
  left,
  top,
  width,
  height,
});

describe('createCanvas2DPaintCanvas', () => {
  it('draws with the paint state and restores the context afterwards', () => {
    const fake = createFakeContext(100, 100);
    const canvas = createCanvas2DPaintCanvas(fake.ctx);
    const image = createImage(10, 10);

    canvas.drawImageRect(image, rect(2, 3, 4, 5), rect(0.4, 0.6, 10.2, 10), {
      ...basePaint,
      opacity: 0.5,
      filterQuality: 'none',
      isAntiAlias: false,
    });

    expect(fake.draws).toHaveLength(1);
    expect(fake.draws[0]?.args).toEqual([image, 2, 3, 4, 5, 0, 1, 11, 10]);
    expect(fake.draws[0]?.state).toEqual({
      globalAlpha: 0.5,
      globalCompositeOperation: 'source-over',
      imageSmoothingEnabled: false,
      imageSmoothingQuality: 'low',
    });
    expect(fake.state().globalAlpha).toBe(1);
    expect(fake.state().imageSmoothingEnabled).toBe(true);
  });

  it('maps blend modes and filter quality onto the context', () => {
    const fake = createFakeContext(100, 100);
    const canvas = createCanvas2DPaintCanvas(fake.ctx);

    canvas.drawImageRect(createImage(4, 4), rect(0, 0, 4, 4), rect(0, 0, 4, 4), {
      ...basePaint,
      blendMode: 'multiply',
      opacity: 3,
      filterQuality: 'high',
    });

    expect(fake.draws[0]?.state).toEqual({
      globalAlpha: 1,
      globalCompositeOperation: 'multiply',
      imageSmoothingEnabled: true,
      imageSmoothingQuality: 'high',
    });
  });

  it('skips dst draws and empty rectangles', () => {
    const fake = createFakeContext(100, 100);
    const canvas = createCanvas2DPaintCanvas(fake.ctx);
    const image = createImage(4, 4);

    canvas.drawImageRect(image, rect(0, 0, 4, 4), rect(0, 0, 4, 4), {
      ...basePaint,
      blendMode: 'dst',
    });
    canvas.drawImageRect(image, rect(0, 0, 4, 4), rect(0, 0, 0, 4), basePaint);

    expect(fake.calls).toEqual([]);
  });

  it('filters the source region on a scratch surface', () => {
    const fake = createFakeContext(100, 100);
    const { factory, surfaces } = createFakeSurfaceFactory([10, 20, 30, 255]);
    const canvas = createCanvas2DPaintCanvas(fake.ctx, {
      createSurface: factory,
    });

    canvas.drawImageRect(
      createImage(2, 1),
      rect(0, 0, 2, 1),
      rect(5, 5, 4, 2),
      { ...basePaint, invertColors: true }
    );

    expect(surfaces).toHaveLength(1);
    const surface = surfaces[0];
    expect(surface?.puts).toEqual([[245, 235, 225, 255, 245, 235, 225, 255]]);
    expect(fake.draws[0]?.args).toEqual([
      surface?.canvas,
      0,
      0,
      2,
      1,
      5,
      5,
      4,
      2,
    ]);
  });

  it('throws when no surface is available for filtering', () => {
    const fake = createFakeContext(100, 100);
    const canvas = createCanvas2DPaintCanvas(fake.ctx, {
      createSurface: () => null,
    });
    let caught: unknown;
    try {
      canvas.drawImageRect(
        createImage(2, 2),
        rect(0, 0, 2, 2),
        rect(0, 0, 2, 2),
        { ...basePaint, colorFilter: INVERT_COLOR_FILTER }
      );
    } catch (error) {
      caught = error;
    }
    expect(caught instanceof ImagePaintingError && caught.code).toBe(
      'surface-unavailable'
    );
  });

  it('composites a layer with its paint on restore', () => {
    const fake = createFakeContext(3, 2);
    const { factory, surfaces } = createFakeSurfaceFactory([0, 0, 0, 255]);
    const canvas = createCanvas2DPaintCanvas(fake.ctx, {
      createSurface: factory,
    });
    const image = createImage(1, 1);

    canvas.saveLayer(null, {
      ...basePaint,
      colorFilter: INVERT_COLOR_FILTER,
      opacity: 0.25,
    });
    canvas.drawImageRect(image, rect(0, 0, 1, 1), rect(0, 0, 1, 1), basePaint);
    expect(fake.draws).toHaveLength(0);
    canvas.restore();

    const layer = surfaces[0];
    expect(layer?.canvas).toEqual({ width: 3, height: 2 });
    expect(layer?.draws[0]?.args).toEqual([image, 0, 0, 1, 1, 0, 0, 1, 1]);
    expect(layer?.puts[0]?.slice(0, 4)).toEqual([255, 255, 255, 255]);
    expect(fake.draws).toHaveLength(1);
    expect(fake.draws[0]?.args).toEqual([layer?.canvas, 0, 0]);
    expect(fake.draws[0]?.state.globalAlpha).toBe(0.25);
  });

  it('throws on a restore without save', () => {
    const canvas = createCanvas2DPaintCanvas(createFakeContext(1, 1).ctx);
    expect(() => canvas.restore()).toThrowError(ImagePaintingError);
  });

  it('clips to rectangles and snaps aliased clip paths', () => {
    const fake = createFakeContext(20, 20);
    const canvas = createCanvas2DPaintCanvas(fake.ctx);

    canvas.clipRect(rect(1, 2, 3, 4));
    canvas.clipPath(createRectPath(rect(0.4, 0.4, 9.2, 9.2)), false);

    expect(fake.calls).toEqual([
      { name: 'beginPath', args: [] },
      { name: 'rect', args: [1, 2, 3, 4] },
      { name: 'clip', args: [] },
      { name: 'beginPath', args: [] },
      { name: 'rect', args: [0, 0, 10, 10] },
      { name: 'clip', args: [] },
    ]);
  });

  it('draws nine patches cell by cell', () => {
    const fake = createFakeContext(100, 100);
    const canvas = createCanvas2DPaintCanvas(fake.ctx);
    const image = createImage(30, 30);

    canvas.drawImageNine(
      image,
      rect(10, 10, 10, 10),
      rect(0, 0, 90, 60),
      basePaint
    );

    expect(fake.draws).toHaveLength(9);
    expect(fake.draws[0]?.args).toEqual([image, 0, 0, 10, 10, 0, 0, 10, 10]);
    expect(fake.draws[4]?.args).toEqual([
      image, 10, 10, 10, 10, 10, 10, 70, 40,
    ]);
  });

  it('confines unbounded composite operations to the destination', () => {
    const fake = createFakeContext(100, 100);
    const canvas = createCanvas2DPaintCanvas(fake.ctx);
    const image = createImage(10, 10);

    canvas.drawImageRect(image, rect(0, 0, 10, 10), rect(40, 40, 10, 10), {
      ...basePaint,
      blendMode: 'src',
    });

    expect(fake.calls.map((call) => call.name)).toEqual([
      'save',
      'save',
      'beginPath',
      'rect',
      'clip',
      'drawImage',
      'restore',
      'restore',
    ]);
    expect(fake.calls[3]?.args).toEqual([40, 40, 10, 10]);
    expect(fake.draws[0]?.state.globalCompositeOperation).toBe('copy');
  });

  it('does not clip bounded composite operations', () => {
    const fake = createFakeContext(100, 100);
    const canvas = createCanvas2DPaintCanvas(fake.ctx);

    canvas.drawImageRect(
      createImage(10, 10),
      rect(0, 0, 10, 10),
      rect(40, 40, 10, 10),
      basePaint
    );

    expect(fake.calls.map((call) => call.name)).toEqual([
      'save',
      'drawImage',
      'restore',
    ]);
  });

  it('clips every nine patch cell for unbounded operations', () => {
    const fake = createFakeContext(100, 100);
    const canvas = createCanvas2DPaintCanvas(fake.ctx);

    canvas.drawImageNine(
      createImage(30, 30),
      rect(10, 10, 10, 10),
      rect(0, 0, 90, 60),
      { ...basePaint, blendMode: 'src-in' }
    );

    const rects = fake.calls
      .filter((call) => call.name === 'rect')
      .map((call) => call.args);
    expect(fake.calls.filter((call) => call.name === 'clip')).toHaveLength(9);
    expect(rects[0]).toEqual([0, 0, 10, 10]);
    expect(rects[4]).toEqual([10, 10, 70, 40]);
  });

  it('clips a layer to its bounds', () => {
    const fake = createFakeContext(3, 2);
    const { factory, surfaces } = createFakeSurfaceFactory();
    const canvas = createCanvas2DPaintCanvas(fake.ctx, {
      createSurface: factory,
    });

    canvas.saveLayer(rect(1, 0, 2, 1), { ...basePaint, blendMode: 'src' });
    canvas.restore();

    const layer = surfaces[0];
    expect(layer?.calls.map((call) => call.name)).toEqual([
      'clearRect',
      'setTransform',
      'beginPath',
      'rect',
      'clip',
    ]);
    expect(layer?.calls[3]?.args).toEqual([1, 0, 2, 1]);
    expect(fake.calls.map((call) => call.name)).toEqual([
      'save',
      'beginPath',
      'rect',
      'clip',
      'setTransform',
      'drawImage',
      'restore',
    ]);
    expect(fake.calls[2]?.args).toEqual([1, 0, 2, 1]);
  });

  it('keeps thin aliased destinations at least one pixel wide', () => {
    const fake = createFakeContext(100, 100);
    const canvas = createCanvas2DPaintCanvas(fake.ctx);
    const image = createImage(4, 4);

    canvas.drawImageRect(image, rect(0, 0, 4, 4), rect(0.1, 0, 0.3, 10), {
      ...basePaint,
      isAntiAlias: false,
    });

    expect(fake.draws[0]?.args).toEqual([image, 0, 0, 4, 4, 0, 0, 1, 10]);
  });

  it('snaps aliased destinations to device pixels', () => {
    const fake = createFakeContext(100, 100, undefined, {
      a: 2,
      b: 0,
      c: 0,
      d: 2,
      e: 0,
      f: 0,
    });
    const canvas = createCanvas2DPaintCanvas(fake.ctx);
    const image = createImage(4, 4);

    canvas.drawImageRect(image, rect(0, 0, 4, 4), rect(0.3, 0.3, 10, 10), {
      ...basePaint,
      isAntiAlias: false,
    });

    expect(fake.draws[0]?.args).toEqual([
      image, 0, 0, 4, 4, 0.5, 0.5, 10, 10,
    ]);
  });
});
