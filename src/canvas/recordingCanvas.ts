// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import { mat2d, vec2 } from 'gl-matrix';
import type { ReadonlyMat2d } from 'gl-matrix';

import type {
  ImagePaint,
  Offset,
  PaintableImage,
  PaintCanvas,
  PaintPath,
  Rect,
} from '../types';
import { ImagePaintingError } from '../errors';

//////////////////////////////////////////////////////////////////////////////////////

/**
 * Transform as `[a, b, c, d, tx, ty]`, mapping (x, y) to (a*x + c*y + tx, b*x + d*y + ty).
 */
export type TransformValues = readonly [
  number,
  number,
  number,
  number,
  number,
  number,
];

/**
 * Call recorded by {@link createRecordingCanvas}.
 */
export type PaintCommand<TImage extends PaintableImage = PaintableImage> =
  | { readonly type: 'save' }
  | {
      readonly type: 'saveLayer';
      readonly bounds: Rect | null;
      readonly paint: ImagePaint;
    }
  | { readonly type: 'restore' }
  | { readonly type: 'translate'; readonly dx: number; readonly dy: number }
  | { readonly type: 'scale'; readonly sx: number; readonly sy: number }
  | { readonly type: 'clipRect'; readonly rect: Rect }
  | {
      readonly type: 'clipPath';
      readonly path: PaintPath;
      readonly isAntiAlias: boolean;
    }
  | {
      readonly type: 'drawImageRect';
      readonly image: TImage;
      readonly src: Rect;
      readonly dst: Rect;
      readonly paint: ImagePaint;
      /** Transform in effect when the call was made. */
      readonly transform: TransformValues;
    }
  | {
      readonly type: 'drawImageNine';
      readonly image: TImage;
      readonly center: Rect;
      readonly dst: Rect;
      readonly paint: ImagePaint;
      /** Transform in effect when the call was made. */
      readonly transform: TransformValues;
    };

/**
 * Canvas that records calls instead of rasterizing them.
 */
export interface RecordingCanvas<TImage extends PaintableImage = PaintableImage>
  extends PaintCanvas<TImage> {
  /** Commands recorded so far. */
  readonly getCommands: () => readonly PaintCommand<TImage>[];
  /** Number of outstanding `save`/`saveLayer` calls. */
  readonly getSaveCount: () => number;
  /** Current transform. */
  readonly getTransform: () => TransformValues;
  /** Maps a point through the current transform. */
  readonly mapPoint: (point: Offset) => Offset;
  /** Issues every recorded call to another canvas. */
  readonly replay: (target: PaintCanvas<TImage>) => void;
  /** Drops the recorded commands and resets the state. */
  readonly clear: () => void;
}

const toTransformValues = (matrix: ReadonlyMat2d): TransformValues => [
  matrix[0],
  matrix[1],
  matrix[2],
  matrix[3],
  matrix[4],
  matrix[5],
];

/**
 * Creates a recording canvas.
 * @returns Recording canvas with an identity transform.
 */
export const createRecordingCanvas = <
  TImage extends PaintableImage = PaintableImage,
>(): RecordingCanvas<TImage> => {
  const commands: PaintCommand<TImage>[] = [];
  const transformStack: mat2d[] = [];
  let transform = mat2d.create();

  const pushState = () => {
    transformStack.push(mat2d.clone(transform));
  };

  const save = () => {
    pushState();
    commands.push({ type: 'save' });
  };

  const saveLayer = (bounds: Rect | null, paint: ImagePaint) => {
    pushState();
    commands.push({ type: 'saveLayer', bounds, paint });
  };

  const restore = () => {
    const previous = transformStack.pop();
    if (!previous) {
      throw new ImagePaintingError(
        'restore() was called without a matching save().',
        'unbalanced-restore'
      );
    }
    transform = previous;
    commands.push({ type: 'restore' });
  };

  const translate = (dx: number, dy: number) => {
    mat2d.translate(transform, transform, [dx, dy]);
    commands.push({ type: 'translate', dx, dy });
  };

  const scale = (sx: number, sy?: number) => {
    const resolvedSy = sy ?? sx;
    mat2d.scale(transform, transform, [sx, resolvedSy]);
    commands.push({ type: 'scale', sx, sy: resolvedSy });
  };

  const clipRect = (rect: Rect) => {
    commands.push({ type: 'clipRect', rect });
  };

  const clipPath = (path: PaintPath, isAntiAlias?: boolean) => {
    commands.push({ type: 'clipPath', path, isAntiAlias: isAntiAlias ?? true });
  };

  const drawImageRect = (
    image: TImage,
    src: Rect,
    dst: Rect,
    paint: ImagePaint
  ) => {
    commands.push({
      type: 'drawImageRect',
      image,
      src,
      dst,
      paint,
      transform: toTransformValues(transform),
    });
  };

  const drawImageNine = (
    image: TImage,
    center: Rect,
    dst: Rect,
    paint: ImagePaint
  ) => {
    commands.push({
      type: 'drawImageNine',
      image,
      center,
      dst,
      paint,
      transform: toTransformValues(transform),
    });
  };

  const mapPoint = (point: Offset): Offset => {
    const mapped = vec2.transformMat2d(
      vec2.create(),
      [point.x, point.y],
      transform
    );
    return { x: mapped[0], y: mapped[1] };
  };

  const replay = (target: PaintCanvas<TImage>) => {
    for (const command of commands) {
      switch (command.type) {
        case 'save':
          target.save();
          break;
        case 'saveLayer':
          target.saveLayer(command.bounds, command.paint);
          break;
        case 'restore':
          target.restore();
          break;
        case 'translate':
          target.translate(command.dx, command.dy);
          break;
        case 'scale':
          target.scale(command.sx, command.sy);
          break;
        case 'clipRect':
          target.clipRect(command.rect);
          break;
        case 'clipPath':
          target.clipPath(command.path, command.isAntiAlias);
          break;
        case 'drawImageRect':
          target.drawImageRect(
            command.image,
            command.src,
            command.dst,
            command.paint
          );
          break;
        case 'drawImageNine':
          target.drawImageNine(
            command.image,
            command.center,
            command.dst,
            command.paint
          );
          break;
      }
    }
  };

  const clear = () => {
    commands.length = 0;
    transformStack.length = 0;
    transform = mat2d.create();
  };

  return {
    save,
    saveLayer,
    restore,
    translate,
    scale,
    clipRect,
    clipPath,
    drawImageRect,
    drawImageNine,
    getCommands: () => commands,
    getSaveCount: () => transformStack.length,
    getTransform: () => toTransformValues(transform),
    mapPoint,
    replay,
    clear,
  };
};
