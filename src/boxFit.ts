// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import type { BoxFit, FittedSizes, Size } from './types';
import { createSize, isSizeEmpty, ZERO_SIZE } from './utils/geometry';

//////////////////////////////////////////////////////////////////////////////////////

const aspectRatioOf = (size: Size): number => size.width / size.height;

/**
 * Computes how a box of `inputSize` is inscribed into a box of `outputSize`.
 * @param fit Fit mode.
 * @param inputSize Size of the content, e.g. the image in logical pixels.
 * @param outputSize Size of the target area.
 * @returns Source portion of the input and destination size in the output.
 * @remarks Both sizes are zero when either box is empty.
 */
export const applyBoxFit = (
  fit: BoxFit,
  inputSize: Size,
  outputSize: Size
): FittedSizes => {
  if (isSizeEmpty(inputSize) || isSizeEmpty(outputSize)) {
    return { source: ZERO_SIZE, destination: ZERO_SIZE };
  }

  const outputIsWider = aspectRatioOf(outputSize) > aspectRatioOf(inputSize);

  switch (fit) {
    case 'fill':
      return { source: inputSize, destination: outputSize };
    case 'contain':
      return {
        source: inputSize,
        destination: outputIsWider
          ? createSize(
              (inputSize.width * outputSize.height) / inputSize.height,
              outputSize.height
            )
          : createSize(
              outputSize.width,
              (inputSize.height * outputSize.width) / inputSize.width
            ),
      };
    case 'cover':
      return {
        source: outputIsWider
          ? createSize(
              inputSize.width,
              (inputSize.width * outputSize.height) / outputSize.width
            )
          : createSize(
              (inputSize.height * outputSize.width) / outputSize.height,
              inputSize.height
            ),
        destination: outputSize,
      };
    case 'fit-width':
      if (outputIsWider) {
        return {
          source: createSize(
            inputSize.width,
            (inputSize.width * outputSize.height) / outputSize.width
          ),
          destination: outputSize,
        };
      }
      return {
        source: inputSize,
        destination: createSize(
          outputSize.width,
          (inputSize.height * outputSize.width) / inputSize.width
        ),
      };
    case 'fit-height':
      if (outputIsWider) {
        return {
          source: inputSize,
          destination: createSize(
            (inputSize.width * outputSize.height) / inputSize.height,
            outputSize.height
          ),
        };
      }
      return {
        source: createSize(
          (inputSize.height * outputSize.width) / outputSize.height,
          inputSize.height
        ),
        destination: outputSize,
      };
    case 'none': {
      const source = createSize(
        Math.min(inputSize.width, outputSize.width),
        Math.min(inputSize.height, outputSize.height)
      );
      return { source, destination: source };
    }
    case 'scale-down': {
      const aspectRatio = aspectRatioOf(inputSize);
      let destination = inputSize;
      if (destination.height > outputSize.height) {
        destination = createSize(
          outputSize.height * aspectRatio,
          outputSize.height
        );
      }
      if (destination.width > outputSize.width) {
        destination = createSize(
          outputSize.width,
          outputSize.width / aspectRatio
        );
      }
      return { source: inputSize, destination };
    }
  }
};
