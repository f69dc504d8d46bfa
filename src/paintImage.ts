// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import type {
  ImagePaint,
  ImageRepeat,
  PaintableImage,
  PaintImageOptions,
  PaintImageResult,
  Rect,
  Size,
} from './types';
import { ALIGNMENT_CENTER } from './const';
import {
  DEFAULT_DEVICE_PIXEL_RATIO,
  DEFAULT_FILTER_QUALITY,
  DEFAULT_IMAGE_OPACITY,
  DEFAULT_IMAGE_REPEAT,
  DEFAULT_IMAGE_SCALE,
} from './default';
import { getImagePaintingDebugSettings } from './config';
import { applyBoxFit } from './boxFit';
import { inscribe } from './alignment';
import { generateImageTileRects } from './tiling';
import { INVERT_COLOR_FILTER } from './colorFilter';
import { ImagePaintingError } from './errors';
import {
  createImageSizeInfo,
  getSharedImageSizeReporter,
} from './imageSizeInfo';
import {
  addSize,
  createRect,
  createSize,
  divideSize,
  isRectEmpty,
  rectSize,
  scaleRect,
  scaleSize,
  sizesEqual,
  subtractSize,
} from './utils/geometry';
import { logWarning } from './utils/logging';

//////////////////////////////////////////////////////////////////////////////////////

/** Tolerance when checking that a nine-patch source is fully visible. */
const CENTER_SLICE_EPSILON = 1e-6;

const INVERTED_LAYER_PAINT: ImagePaint = {
  blendMode: 'src-over',
  opacity: 1,
  colorFilter: INVERT_COLOR_FILTER,
  filterQuality: DEFAULT_FILTER_QUALITY,
  invertColors: false,
  isAntiAlias: false,
} as const;

const sizesNearlyEqual = (a: Size, b: Size): boolean =>
  Math.abs(a.width - b.width) <= CENTER_SLICE_EPSILON &&
  Math.abs(a.height - b.height) <= CENTER_SLICE_EPSILON;

const describeImage = (image: PaintableImage, label: string | undefined) =>
  label ?? `<Unknown Image(${image.width}×${image.height})>`;

//////////////////////////////////////////////////////////////////////////////////////

/**
 * Paints an image into a rectangle of the canvas.
 * @param options Painting options.
 * @returns Drawn geometry, or `null` when `rect` is empty and nothing was painted.
 * @throws ImagePaintingError when the image is disposed, or the center slice is combined with a fit
 * that may hide part of the image.
 * @remarks
 * The image is fitted with `fit` into `rect` (reduced by the fixed nine-patch borders when
 * `centerSlice` is given), placed by `alignment`, then drawn once or tiled over `rect`.
 * With `flipHorizontally` the image is mirrored about the vertical center line of `rect`,
 * and the horizontal alignment is mirrored along with it.
 */
export const paintImage = <TImage extends PaintableImage>(
  options: PaintImageOptions<TImage>
): PaintImageResult | null => {
  const { canvas, rect, image, centerSlice } = options;

  if (image.isDisposed?.() === true) {
    throw new ImagePaintingError(
      'Cannot paint an image that is disposed. Dispose the image only after painting has completed.',
      'image-disposed'
    );
  }
  if (isRectEmpty(rect)) {
    return null;
  }

  const scale = options.scale ?? DEFAULT_IMAGE_SCALE;
  const alignment = options.alignment ?? ALIGNMENT_CENTER;
  const flipHorizontally = options.flipHorizontally ?? false;

  let outputSize = rectSize(rect);
  let inputSize = createSize(image.width, image.height);
  let sliceBorder: Size | undefined;
  if (centerSlice) {
    sliceBorder = subtractSize(
      divideSize(inputSize, scale),
      rectSize(centerSlice)
    );
    outputSize = subtractSize(outputSize, sliceBorder);
    inputSize = subtractSize(inputSize, scaleSize(sliceBorder, scale));
  }

  const fit = options.fit ?? (centerSlice ? 'fill' : 'scale-down');
  if (centerSlice && (fit === 'none' || fit === 'cover')) {
    throw new ImagePaintingError(
      `centerSlice cannot be combined with fit "${fit}".`,
      'invalid-center-slice'
    );
  }

  const fittedSizes = applyBoxFit(fit, divideSize(inputSize, scale), outputSize);
  const sourceSize = scaleSize(fittedSizes.source, scale);
  let destinationSize = fittedSizes.destination;
  if (sliceBorder) {
    outputSize = addSize(outputSize, sliceBorder);
    destinationSize = addSize(destinationSize, sliceBorder);
    // A nine-patch stretch cannot also draw a subset of the image.
    // Zero fitted sizes (borders larger than the rect) shrink the borders instead.
    const fittedEmpty =
      fittedSizes.source.width === 0 && fittedSizes.source.height === 0;
    if (!fittedEmpty && !sizesNearlyEqual(sourceSize, inputSize)) {
      throw new ImagePaintingError(
        'centerSlice was used with a fit that does not keep the image fully visible.',
        'center-slice-clipped'
      );
    }
  }

  let repeat: ImageRepeat = options.repeat ?? DEFAULT_IMAGE_REPEAT;
  if (repeat !== 'no-repeat' && sizesEqual(destinationSize, outputSize)) {
    // Exactly filled, nothing to repeat.
    repeat = 'no-repeat';
  }

  const paint: ImagePaint = {
    blendMode: options.blendMode,
    opacity: options.opacity ?? DEFAULT_IMAGE_OPACITY,
    colorFilter: options.colorFilter,
    filterQuality: options.filterQuality ?? DEFAULT_FILTER_QUALITY,
    invertColors: options.invertColors ?? false,
    isAntiAlias: options.isAntiAlias ?? false,
  };

  const halfWidthDelta = (outputSize.width - destinationSize.width) / 2.0;
  const halfHeightDelta = (outputSize.height - destinationSize.height) / 2.0;
  const dx =
    halfWidthDelta +
    (flipHorizontally ? -alignment.x : alignment.x) * halfWidthDelta;
  const dy = halfHeightDelta + alignment.y * halfHeightDelta;
  const destinationRect = createRect(
    rect.left + dx,
    rect.top + dy,
    destinationSize.width,
    destinationSize.height
  );

  // Set when a layer was pushed to invert and flip an oversized image.
  let invertedCanvas = false;
  const debugSettings = getImagePaintingDebugSettings();
  if (debugSettings.trackImageSizes) {
    const devicePixelRatio =
      options.devicePixelRatio ?? DEFAULT_DEVICE_PIXEL_RATIO;
    const sizeInfo = createImageSizeInfo(
      describeImage(image, options.debugImageLabel),
      createSize(image.width, image.height),
      scaleSize(outputSize, devicePixelRatio)
    );
    if (
      debugSettings.invertOversizedImages &&
      sizeInfo.decodedSizeInBytes >
        sizeInfo.displaySizeInBytes + debugSettings.imageOverheadAllowance
    ) {
      const overheadInKilobytes = Math.trunc(
        (sizeInfo.decodedSizeInBytes - sizeInfo.displaySizeInBytes) / 1024
      );
      const outputWidth = Math.trunc(sizeInfo.displaySize.width);
      const outputHeight = Math.trunc(sizeInfo.displaySize.height);
      logWarning(
        `Image ${sizeInfo.source} has a display size of ${outputWidth}×${outputHeight} ` +
          `but a decode size of ${image.width}×${image.height}, which uses an additional ` +
          `${overheadInKilobytes}KB. Consider resizing the asset ahead of time.`
      );
      canvas.saveLayer(destinationRect, INVERTED_LAYER_PAINT);
      const centerY = -(rect.top + rect.height / 2.0);
      canvas.translate(0.0, -centerY);
      canvas.scale(1.0, -1.0);
      canvas.translate(0.0, centerY);
      invertedCanvas = true;
    }
    (options.sizeReporter ?? getSharedImageSizeReporter()).report(sizeInfo);
  }

  const needSave =
    centerSlice !== undefined || repeat !== 'no-repeat' || flipHorizontally;
  if (needSave) {
    canvas.save();
  }
  if (repeat !== 'no-repeat') {
    canvas.clipRect(rect);
  }
  if (flipHorizontally) {
    const centerX = -(rect.left + rect.width / 2.0);
    canvas.translate(-centerX, 0.0);
    canvas.scale(-1.0, 1.0);
    canvas.translate(centerX, 0.0);
  }

  const tileRects: Rect[] =
    repeat === 'no-repeat'
      ? [destinationRect]
      : generateImageTileRects(rect, destinationRect, repeat);

  let sourceRect: Rect | null = null;
  if (!centerSlice) {
    const imageSourceRect = inscribe(
      alignment,
      sourceSize,
      createRect(0, 0, inputSize.width, inputSize.height)
    );
    sourceRect = imageSourceRect;
    for (const tileRect of tileRects) {
      canvas.drawImageRect(image, imageSourceRect, tileRect, paint);
    }
  } else {
    canvas.scale(1 / scale);
    const scaledCenterSlice = scaleRect(centerSlice, scale);
    for (const tileRect of tileRects) {
      canvas.drawImageNine(
        image,
        scaledCenterSlice,
        scaleRect(tileRect, scale),
        paint
      );
    }
  }

  if (needSave) {
    canvas.restore();
  }
  if (invertedCanvas) {
    canvas.restore();
  }

  return { destinationRect, sourceRect, tileRects, repeat };
};
