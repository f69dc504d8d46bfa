// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import { describe, expect, it } from 'vitest';

import { createRecordingCanvas } from '../../src/canvas/recordingCanvas';
import { createRectPath } from '../../src/canvas/path';
import { ImagePaintingError } from '../../src/errors';
import type { ImagePaint, PaintableImage } from '../../src/types';

const image: PaintableImage = { width: 8, height: 4 };

const paint: ImagePaint = {
  blendMode: 'src-over',
  opacity: 1,
  filterQuality: 'low',
  invertColors: false,
  isAntiAlias: false,
};

const rect = (left: number, top: number, width: number, height: number) => ({
  left,
  top,
  width,
  height,
});

describe('createRecordingCanvas', () => {
  it('tracks the transform with translate and scale', () => {
    const canvas = createRecordingCanvas();
    canvas.translate(10, 20);
    canvas.scale(2, 3);
    expect(canvas.getTransform()).toEqual([2, 0, 0, 3, 10, 20]);
    expect(canvas.mapPoint({ x: 1, y: 1 })).toEqual({ x: 12, y: 23 });
  });

  it('restores the transform saved by save and saveLayer', () => {
    const canvas = createRecordingCanvas();
    canvas.save();
    canvas.translate(5, 5);
    canvas.saveLayer(null, paint);
    canvas.scale(-1);
    expect(canvas.getSaveCount()).toBe(2);
    canvas.restore();
    expect(canvas.getTransform()).toEqual([1, 0, 0, 1, 5, 5]);
    canvas.restore();
    expect(canvas.getTransform()).toEqual([1, 0, 0, 1, 0, 0]);
    expect(canvas.getSaveCount()).toBe(0);
  });

  it('throws on a restore without save', () => {
    const canvas = createRecordingCanvas();
    expect(() => canvas.restore()).toThrowError(ImagePaintingError);
  });

  it('records draws with the transform in effect', () => {
    const canvas = createRecordingCanvas();
    canvas.scale(2);
    canvas.drawImageRect(image, rect(0, 0, 8, 4), rect(1, 1, 4, 2), paint);
    canvas.clipPath(createRectPath(rect(0, 0, 1, 1)));

    expect(canvas.getCommands()).toEqual([
      { type: 'scale', sx: 2, sy: 2 },
      {
        type: 'drawImageRect',
        image,
        src: rect(0, 0, 8, 4),
        dst: rect(1, 1, 4, 2),
        paint,
        transform: [2, 0, 0, 2, 0, 0],
      },
      {
        type: 'clipPath',
        path: createRectPath(rect(0, 0, 1, 1)),
        isAntiAlias: true,
      },
    ]);
  });

  it('replays its commands into another canvas and clears', () => {
    const source = createRecordingCanvas();
    source.save();
    source.translate(3, 4);
    source.clipRect(rect(0, 0, 10, 10));
    source.drawImageNine(image, rect(2, 1, 4, 2), rect(0, 0, 20, 8), paint);
    source.restore();

    const target = createRecordingCanvas();
    source.replay(target);
    expect(target.getCommands()).toEqual(source.getCommands());

    source.clear();
    expect(source.getCommands()).toEqual([]);
    expect(source.getTransform()).toEqual([1, 0, 0, 1, 0, 0]);
  });
});
