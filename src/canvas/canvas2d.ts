// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import type {
  ColorFilter,
  FilterQuality,
  ImagePaint,
  PaintableImage,
  PaintCanvas,
  PaintPath,
  PathCommand,
  Rect,
} from '../types';
import type {
  Canvas2DContext,
  Canvas2DSurface,
  Canvas2DSurfaceFactory,
} from '../internalTypes';
import { resolveCompositeOperation } from '../blendMode';
import {
  applyColorFilterToPixels,
  resolvePaintColorFilters,
} from '../colorFilter';
import { ImagePaintingError } from '../errors';
import { computeNinePatchSlices } from '../ninePatch';
import { UNBOUNDED_COMPOSITE_OPERATIONS } from '../const';
import { isRectEmpty } from '../utils/geometry';
import { createDefaultCanvas2DSurface } from './surface';
import { tracePath } from './path';

//////////////////////////////////////////////////////////////////////////////////////

/**
 * Image types the Canvas 2D backend can draw.
 */
export type Canvas2DImage = PaintableImage & CanvasImageSource;

export interface Canvas2DPaintCanvasOptions {
  /**
   * Creates offscreen surfaces used for color filters and layers.
   * Defaults to `OffscreenCanvas`, then `document.createElement('canvas')`.
   */
  readonly createSurface?: Canvas2DSurfaceFactory;
}

interface SaveFrame {
  readonly kind: 'save';
}

interface LayerFrame {
  readonly kind: 'layer';
  readonly parent: Canvas2DContext;
  readonly surface: Canvas2DSurface;
  readonly bounds: Rect | null;
  readonly paint: ImagePaint;
}

type StateFrame = SaveFrame | LayerFrame;

/** Source region ready to be drawn with `drawImage`. */
interface PreparedSource {
  readonly source: CanvasImageSource;
  readonly region: Rect;
}

const clampOpacity = (value: number): number =>
  Number.isFinite(value) ? Math.min(1, Math.max(0, value)) : 1;

const applyFilterQuality = (
  ctx: Canvas2DContext,
  filterQuality: FilterQuality
): void => {
  if (filterQuality === 'none') {
    ctx.imageSmoothingEnabled = false;
    return;
  }
  ctx.imageSmoothingEnabled = true;
  ctx.imageSmoothingQuality = filterQuality;
};

/** The part of a context transform used to snap to device pixels. */
type DeviceTransform = Pick<DOMMatrix2DInit, 'a' | 'b' | 'c' | 'd' | 'e' | 'f'>;

/**
 * Rounds one axis of a span to device pixels and maps it back to user space.
 * A non-empty span keeps at least one device pixel.
 */
const snapSpan = (
  start: number,
  length: number,
  scale: number,
  offset: number
): readonly [number, number] => {
  const from = start * scale + offset;
  const to = (start + length) * scale + offset;
  const low = Math.round(Math.min(from, to));
  const high = Math.max(Math.round(Math.max(from, to)), low + 1);
  const userLow = (low - offset) / scale;
  const userHigh = (high - offset) / scale;
  return [Math.min(userLow, userHigh), Math.abs(userHigh - userLow)];
};

/**
 * Aliased draws land on whole device pixels.
 * Rotated or skewed transforms are left alone.
 */
const snapRect = (rect: Rect, transform: DeviceTransform): Rect => {
  const { a = 1, b = 0, c = 0, d = 1, e = 0, f = 0 } = transform;
  if (b !== 0 || c !== 0 || a === 0 || d === 0 || isRectEmpty(rect)) {
    return rect;
  }
  const [left, width] = snapSpan(rect.left, rect.width, a, e);
  const [top, height] = snapSpan(rect.top, rect.height, d, f);
  return { left, top, width, height };
};

const snapPath = (path: PaintPath, transform: DeviceTransform): PaintPath => ({
  commands: path.commands.map((command): PathCommand =>
    command.type === 'rect'
      ? { type: 'rect', rect: snapRect(command.rect, transform) }
      : command
  ),
});

const clipToRect = (target: Canvas2DContext, rect: Rect): void => {
  target.beginPath();
  target.rect(rect.left, rect.top, rect.width, rect.height);
  target.clip();
};

const filterSurfacePixels = (
  surface: Canvas2DSurface,
  filters: readonly ColorFilter[]
): void => {
  const { width, height } = surface.canvas;
  const imageData = surface.ctx.getImageData(0, 0, width, height);
  for (const filter of filters) {
    applyColorFilterToPixels(imageData.data, filter);
  }
  surface.ctx.putImageData(imageData, 0, 0);
};

/**
 * Creates a {@link PaintCanvas} that draws with a Canvas 2D context.
 * @param ctx Target context. Its state is saved around every draw.
 * @param options Backend options.
 * @returns Paint canvas.
 * @remarks Color filters and inverted colors are applied on offscreen surfaces by reading back pixels.
 */
export const createCanvas2DPaintCanvas = <
  TImage extends Canvas2DImage = Canvas2DImage,
>(
  ctx: Canvas2DContext,
  options?: Canvas2DPaintCanvasOptions
): PaintCanvas<TImage> => {
  const createSurface = options?.createSurface ?? createDefaultCanvas2DSurface;
  const frames: StateFrame[] = [];
  let active: Canvas2DContext = ctx;

  const requireSurface = (width: number, height: number): Canvas2DSurface => {
    const surface = createSurface(width, height);
    if (!surface) {
      throw new ImagePaintingError(
        'No offscreen surface is available for color filtering or layers.',
        'surface-unavailable'
      );
    }
    return surface;
  };

  /**
   * Copies the source region onto a scratch surface and filters it when the paint asks for it.
   */
  const prepareSource = (
    image: TImage,
    region: Rect,
    filters: readonly ColorFilter[]
  ): PreparedSource => {
    if (filters.length === 0) {
      return { source: image, region };
    }
    const surface = requireSurface(region.width, region.height);
    const { width, height } = surface.canvas;
    surface.ctx.clearRect(0, 0, width, height);
    surface.ctx.drawImage(
      image,
      region.left,
      region.top,
      region.width,
      region.height,
      0,
      0,
      width,
      height
    );
    filterSurfacePixels(surface, filters);
    return {
      source: surface.canvas,
      region: { left: 0, top: 0, width, height },
    };
  };

  /**
   * Runs `draw` on the active context with the paint's blending state applied.
   * `clipped` is true when the operation would touch pixels outside the drawn area.
   */
  const drawPrepared = (
    paint: ImagePaint,
    draw: (target: Canvas2DContext, clipped: boolean) => void
  ): void => {
    const { operation } = resolveCompositeOperation(paint.blendMode);
    if (operation === null) {
      return;
    }
    active.save();
    try {
      active.globalAlpha = clampOpacity(paint.opacity);
      active.globalCompositeOperation = operation;
      applyFilterQuality(active, paint.filterQuality);
      draw(active, UNBOUNDED_COMPOSITE_OPERATIONS.has(operation));
    } finally {
      active.restore();
    }
  };

  /**
   * Unbounded composite operations are confined to `dst`.
   */
  const drawInto = (
    target: Canvas2DContext,
    clipped: boolean,
    dst: Rect,
    draw: () => void
  ): void => {
    if (!clipped) {
      draw();
      return;
    }
    target.save();
    try {
      clipToRect(target, dst);
      draw();
    } finally {
      target.restore();
    }
  };

  /**
   * Draws `imageRegion` (image coordinates) from a prepared copy of `imageOrigin`.
   */
  const drawRegion = (
    target: Canvas2DContext,
    prepared: PreparedSource,
    imageRegion: Rect,
    imageOrigin: Rect,
    dst: Rect
  ): void => {
    const scaleX = prepared.region.width / imageOrigin.width;
    const scaleY = prepared.region.height / imageOrigin.height;
    target.drawImage(
      prepared.source,
      prepared.region.left + (imageRegion.left - imageOrigin.left) * scaleX,
      prepared.region.top + (imageRegion.top - imageOrigin.top) * scaleY,
      imageRegion.width * scaleX,
      imageRegion.height * scaleY,
      dst.left,
      dst.top,
      dst.width,
      dst.height
    );
  };

  const save = () => {
    active.save();
    frames.push({ kind: 'save' });
  };

  const saveLayer = (bounds: Rect | null, paint: ImagePaint) => {
    const { width, height } = active.canvas;
    const surface = requireSurface(width, height);
    surface.ctx.clearRect(0, 0, surface.canvas.width, surface.canvas.height);
    surface.ctx.setTransform(active.getTransform());
    if (bounds) {
      clipToRect(surface.ctx, bounds);
    }
    frames.push({ kind: 'layer', parent: active, surface, bounds, paint });
    active = surface.ctx;
  };

  const restore = () => {
    const frame = frames.pop();
    if (!frame) {
      throw new ImagePaintingError(
        'restore() was called without a matching save().',
        'unbalanced-restore'
      );
    }
    if (frame.kind === 'save') {
      active.restore();
      return;
    }

    active = frame.parent;
    const filters = resolvePaintColorFilters(frame.paint);
    if (filters.length > 0) {
      filterSurfacePixels(frame.surface, filters);
    }
    const { bounds } = frame;
    drawPrepared(frame.paint, (target, clipped) => {
      // Clip in user space before dropping to device space for the copy.
      if (clipped && bounds) {
        clipToRect(target, bounds);
      }
      target.setTransform(1, 0, 0, 1, 0, 0);
      target.drawImage(frame.surface.canvas, 0, 0);
    });
  };

  const translate = (dx: number, dy: number) => {
    active.translate(dx, dy);
  };

  const scale = (sx: number, sy?: number) => {
    active.scale(sx, sy ?? sx);
  };

  const clipRect = (rect: Rect) => {
    clipToRect(active, rect);
  };

  const clipPath = (path: PaintPath, isAntiAlias?: boolean) => {
    tracePath(
      active,
      isAntiAlias === false ? snapPath(path, active.getTransform()) : path
    );
    active.clip();
  };

  const drawImageRect = (
    image: TImage,
    src: Rect,
    dst: Rect,
    paint: ImagePaint
  ) => {
    if (isRectEmpty(src) || isRectEmpty(dst)) {
      return;
    }
    const target = paint.isAntiAlias
      ? dst
      : snapRect(dst, active.getTransform());
    drawPrepared(paint, (context, clipped) => {
      const prepared = prepareSource(
        image,
        src,
        resolvePaintColorFilters(paint)
      );
      drawInto(context, clipped, target, () =>
        drawRegion(context, prepared, src, src, target)
      );
    });
  };

  const drawImageNine = (
    image: TImage,
    center: Rect,
    dst: Rect,
    paint: ImagePaint
  ) => {
    if (isRectEmpty(dst)) {
      return;
    }
    const imageRect: Rect = {
      left: 0,
      top: 0,
      width: image.width,
      height: image.height,
    };
    if (isRectEmpty(imageRect)) {
      return;
    }
    const slices = computeNinePatchSlices(
      imageRect,
      center,
      paint.isAntiAlias ? dst : snapRect(dst, active.getTransform())
    );
    drawPrepared(paint, (context, clipped) => {
      const prepared = prepareSource(
        image,
        imageRect,
        resolvePaintColorFilters(paint)
      );
      for (const slice of slices) {
        drawInto(context, clipped, slice.destination, () =>
          drawRegion(
            context,
            prepared,
            slice.source,
            imageRect,
            slice.destination
          )
        );
      }
    });
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
  };
};
