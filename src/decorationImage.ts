// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import type {
  BlendMode,
  DecorationImage,
  DecorationImagePainter,
  ImageConfiguration,
  ImageInfo,
  ImageStream,
  ImageStreamListener,
  PaintableImage,
  PaintCanvas,
  PaintPath,
  Rect,
} from './types';
import { ALIGNMENT_CENTER } from './const';
import {
  DEFAULT_FILTER_QUALITY,
  DEFAULT_IMAGE_OPACITY,
  DEFAULT_IMAGE_REPEAT,
  DEFAULT_IMAGE_SCALE,
} from './default';
import { isAlignmentDirectional, resolveAlignment } from './alignment';
import { ImagePaintingError } from './errors';
import { paintImage } from './paintImage';

//////////////////////////////////////////////////////////////////////////////////////

const describeDetails = <TImage extends PaintableImage>(
  details: DecorationImage<TImage>
): string => {
  const properties: string[] = [];
  if (details.colorFilter) {
    properties.push(`colorFilter: ${details.colorFilter.type}`);
  }
  if (details.fit) {
    properties.push(`fit: ${details.fit}`);
  }
  if (details.alignment) {
    properties.push(
      isAlignmentDirectional(details.alignment)
        ? `alignment: (start ${details.alignment.start}, ${details.alignment.y})`
        : `alignment: (${details.alignment.x}, ${details.alignment.y})`
    );
  }
  if (details.centerSlice) {
    const { left, top, width, height } = details.centerSlice;
    properties.push(`centerSlice: (${left}, ${top}, ${width}, ${height})`);
  }
  if (details.repeat && details.repeat !== DEFAULT_IMAGE_REPEAT) {
    properties.push(`repeat: ${details.repeat}`);
  }
  if (details.matchTextDirection) {
    properties.push('match text direction');
  }
  properties.push(`scale: ${(details.scale ?? DEFAULT_IMAGE_SCALE).toFixed(1)}`);
  properties.push(
    `opacity: ${(details.opacity ?? DEFAULT_IMAGE_OPACITY).toFixed(1)}`
  );
  properties.push(
    `filterQuality: ${details.filterQuality ?? DEFAULT_FILTER_QUALITY}`
  );
  if (details.invertColors) {
    properties.push('invertColors');
  }
  if (details.isAntiAlias) {
    properties.push('isAntiAlias');
  }
  return properties.join(', ');
};

/**
 * Creates a painter for a decoration image.
 * @param details Image and painting options.
 * @param onChanged Called when an image arrives asynchronously and the owner should repaint.
 * @returns Painter. Dispose it once it is no longer used.
 */
export const createDecorationImagePainter = <
  TImage extends PaintableImage = PaintableImage,
>(
  details: DecorationImage<TImage>,
  onChanged: () => void
): DecorationImagePainter<TImage> => {
  let stream: ImageStream<TImage> | null = null;
  let image: ImageInfo<TImage> | null = null;
  let disposed = false;

  const handleImage = (value: ImageInfo<TImage>, synchronousCall: boolean) => {
    if (image === value) {
      return;
    }
    if (image && image.isCloneOf(value)) {
      value.dispose();
      return;
    }
    image?.dispose();
    image = value;
    if (!synchronousCall) {
      onChanged();
    }
  };

  const listener: ImageStreamListener<TImage> = {
    onImage: handleImage,
    onError: details.onError,
  };

  const paint = (
    canvas: PaintCanvas<TImage>,
    rect: Rect,
    clipPath: PaintPath | null,
    configuration: ImageConfiguration,
    blendMode: BlendMode
  ): void => {
    if (disposed) {
      throw new ImagePaintingError(
        'Cannot paint with a disposed decoration image painter.',
        'painter-disposed'
      );
    }

    let flipHorizontally = false;
    if (details.matchTextDirection) {
      if (configuration.textDirection === undefined) {
        throw new ImagePaintingError(
          'A decoration image that matches the text direction needs a text direction in the configuration.',
          'text-direction-missing'
        );
      }
      flipHorizontally = configuration.textDirection === 'rtl';
    }

    const newStream = details.image.resolve(configuration);
    if (stream === null || !Object.is(newStream.key, stream.key)) {
      const oldStream = stream;
      stream = newStream;
      // Adding first keeps a shared completer alive across the switch.
      newStream.addListener(listener);
      oldStream?.removeListener(listener);
    }

    if (!image) {
      return;
    }

    if (clipPath) {
      canvas.save();
      canvas.clipPath(clipPath);
    }

    paintImage({
      canvas,
      rect,
      image: image.image,
      blendMode,
      debugImageLabel: image.debugLabel,
      scale: (details.scale ?? DEFAULT_IMAGE_SCALE) * image.scale,
      colorFilter: details.colorFilter,
      fit: details.fit,
      alignment: resolveAlignment(
        details.alignment ?? ALIGNMENT_CENTER,
        configuration.textDirection
      ),
      centerSlice: details.centerSlice,
      repeat: details.repeat ?? DEFAULT_IMAGE_REPEAT,
      flipHorizontally,
      opacity: details.opacity ?? DEFAULT_IMAGE_OPACITY,
      filterQuality: details.filterQuality ?? DEFAULT_FILTER_QUALITY,
      invertColors: details.invertColors ?? false,
      isAntiAlias: details.isAntiAlias ?? false,
      devicePixelRatio: configuration.devicePixelRatio,
    });

    if (clipPath) {
      canvas.restore();
    }
  };

  const dispose = (): void => {
    if (disposed) {
      return;
    }
    disposed = true;
    stream?.removeListener(listener);
    stream = null;
    image?.dispose();
    image = null;
  };

  const describe = (): string =>
    `DecorationImagePainter(stream: ${stream ? 'resolved' : 'none'}, ` +
    `image: ${image ? `${image.image.width}×${image.image.height}@${image.scale}x` : 'none'}) ` +
    `for DecorationImage(${describeDetails(details)})`;

  return {
    details,
    paint,
    dispose,
    describe,
  };
};
