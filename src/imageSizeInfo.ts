// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import type { ImageSizeInfo, ImageSizeReporter, Size } from './types';
import { BYTES_PER_PIXEL, MIPMAP_OVERHEAD } from './const';
import { getImagePaintingDebugSettings } from './config';
import { sizesEqual } from './utils/geometry';

//////////////////////////////////////////////////////////////////////////////////////

/**
 * Bytes an RGBA8 image of `size` occupies with a full mipmap chain.
 */
export const sizeToBytes = (size: Size): number =>
  Math.floor(size.width * size.height * BYTES_PER_PIXEL * MIPMAP_OVERHEAD);

/**
 * Creates size information for a painted image.
 * @param source Image label.
 * @param imageSize Decoded size.
 * @param displaySize Display size in physical pixels.
 */
export const createImageSizeInfo = (
  source: string,
  imageSize: Size,
  displaySize: Size
): ImageSizeInfo => ({
  source,
  imageSize,
  displaySize,
  decodedSizeInBytes: sizeToBytes(imageSize),
  displaySizeInBytes: sizeToBytes(displaySize),
});

export const imageSizeInfoEquals = (
  a: ImageSizeInfo,
  b: ImageSizeInfo
): boolean =>
  a.source === b.source &&
  sizesEqual(a.imageSize, b.imageSize) &&
  sizesEqual(a.displaySize, b.displaySize);

/**
 * Serializable form of the size information, as posted at the end of a frame.
 */
export const imageSizeInfoToJson = (
  info: ImageSizeInfo
): Record<string, number | Record<string, number>> => ({
  imageSize: { width: info.imageSize.width, height: info.imageSize.height },
  displaySize: {
    width: info.displaySize.width,
    height: info.displaySize.height,
  },
  decodedSizeInBytes: info.decodedSizeInBytes,
  displaySizeInBytes: info.displaySizeInBytes,
});

//////////////////////////////////////////////////////////////////////////////////////

export interface ImageSizeReporterOptions {
  /** Receives the entries of every non-empty frame. */
  readonly onFrame?: (entries: ReadonlyMap<string, ImageSizeInfo>) => void;
}

/**
 * Creates an image size reporter.
 * @param options Reporter options.
 * @returns Reporter. Call `flushFrame` once painting of a frame completes.
 */
export const createImageSizeReporter = (
  options?: ImageSizeReporterOptions
): ImageSizeReporter => {
  let pending = new Map<string, ImageSizeInfo>();
  let lastFrame: ImageSizeInfo[] = [];

  const report = (info: ImageSizeInfo): void => {
    // Entries identical to the previous frame are not reported again.
    if (lastFrame.some((entry) => imageSizeInfoEquals(entry, info))) {
      return;
    }
    const existing = pending.get(info.source);
    if (
      existing === undefined ||
      existing.displaySizeInBytes < info.displaySizeInBytes
    ) {
      pending.set(info.source, info);
    }
    getImagePaintingDebugSettings().onPaintImage?.(info);
  };

  const flushFrame = (): ReadonlyMap<string, ImageSizeInfo> | null => {
    lastFrame = Array.from(pending.values());
    if (pending.size === 0) {
      return null;
    }
    const posted = pending;
    pending = new Map();
    options?.onFrame?.(posted);
    return posted;
  };

  const resetLastFrame = (): void => {
    lastFrame = [];
  };

  return {
    report,
    flushFrame,
    resetLastFrame,
    getPending: () => pending,
  };
};

//////////////////////////////////////////////////////////////////////////////////////

const sharedImageSizeReporter = createImageSizeReporter();

/**
 * Reporter used by {@link paintImage} when none is given.
 */
export const getSharedImageSizeReporter = (): ImageSizeReporter =>
  sharedImageSizeReporter;

/**
 * Ends the frame of the shared reporter.
 */
export const flushImageSizeFrame = (): ReadonlyMap<
  string,
  ImageSizeInfo
> | null => sharedImageSizeReporter.flushFrame();

/**
 * Forgets the last frame of the shared reporter so identical entries are reported again.
 */
export const debugFlushLastFrameImageSizeInfo = (): void => {
  sharedImageSizeReporter.resetLastFrame();
};
