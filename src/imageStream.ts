// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import { createDeferred, onAbort } from 'async-primitives';

import type {
  ImageConfiguration,
  ImageFrame,
  ImageInfo,
  ImageProvider,
  ImageProviderInit,
  ImageStream,
  ImageStreamCompleter,
  ImageStreamListener,
  PaintableImage,
} from './types';
import type { SharedImageHandle } from './internalTypes';
import { DEFAULT_IMAGE_SCALE } from './default';
import { ImagePaintingError } from './errors';
import { logError } from './utils/logging';

//////////////////////////////////////////////////////////////////////////////////////

export interface ImageInfoOptions {
  /** Image pixels per logical pixel. Defaults to 1. */
  readonly scale?: number;
  readonly debugLabel?: string;
}

const createImageInfoFromHandle = <TImage extends PaintableImage>(
  handle: SharedImageHandle<TImage>,
  scale: number,
  debugLabel: string | undefined
): ImageInfo<TImage> => {
  let disposed = false;

  const info: ImageInfo<TImage> = {
    image: handle.image,
    scale,
    debugLabel,
    get isDisposed() {
      return disposed;
    },
    clone: () => {
      if (disposed) {
        throw new ImagePaintingError(
          'Cannot clone an image handle that is already disposed.',
          'image-disposed'
        );
      }
      handle.refCount += 1;
      return createImageInfoFromHandle(handle, scale, debugLabel);
    },
    isCloneOf: (other) =>
      other.image === handle.image &&
      other.scale === scale &&
      other.debugLabel === debugLabel,
    dispose: () => {
      if (disposed) {
        throw new ImagePaintingError(
          'The image handle is already disposed.',
          'image-disposed'
        );
      }
      disposed = true;
      handle.refCount -= 1;
      if (handle.refCount === 0) {
        handle.image.close?.();
      }
    },
  };
  return info;
};

/**
 * Wraps a decoded image into a handle.
 * @param image Decoded image. Its `close` runs when the last clone is disposed.
 * @param options Scale and label.
 * @returns Image handle owning one reference.
 */
export const createImageInfo = <TImage extends PaintableImage>(
  image: TImage,
  options?: ImageInfoOptions
): ImageInfo<TImage> =>
  createImageInfoFromHandle(
    { image, refCount: 1 },
    options?.scale ?? DEFAULT_IMAGE_SCALE,
    options?.debugLabel
  );

//////////////////////////////////////////////////////////////////////////////////////

export interface ImageStreamCompleterHooks {
  /** Called before the first listener is added. */
  readonly onListen?: () => void;
  /** Called after the last listener is removed. */
  readonly onIdle?: () => void;
}

/**
 * Creates an image stream completer.
 * @param hooks Listener lifecycle callbacks.
 * @returns Completer without an image.
 */
export const createImageStreamCompleter = <TImage extends PaintableImage>(
  hooks?: ImageStreamCompleterHooks
): ImageStreamCompleter<TImage> => {
  let listeners: ImageStreamListener<TImage>[] = [];
  let current: ImageInfo<TImage> | null = null;
  let lastError: { readonly error: unknown } | null = null;

  const deliverImage = (
    listener: ImageStreamListener<TImage>,
    info: ImageInfo<TImage>,
    synchronousCall: boolean
  ): void => {
    const clone = info.clone();
    try {
      listener.onImage(clone, synchronousCall);
    } catch (error) {
      if (!clone.isDisposed) {
        clone.dispose();
      }
      logError('An image stream listener threw while handling an image.', error);
    }
  };

  const addListener = (listener: ImageStreamListener<TImage>): void => {
    if (listeners.length === 0) {
      hooks?.onListen?.();
    }
    listeners.push(listener);
    if (current) {
      deliverImage(listener, current, true);
    } else if (lastError) {
      listener.onError?.(lastError.error);
    }
  };

  const removeListener = (listener: ImageStreamListener<TImage>): void => {
    const index = listeners.indexOf(listener);
    if (index < 0) {
      return;
    }
    listeners.splice(index, 1);
    if (listeners.length === 0) {
      hooks?.onIdle?.();
    }
  };

  const setImage = (info: ImageInfo<TImage>): void => {
    const previous = current;
    current = info;
    lastError = null;
    for (const listener of listeners.slice()) {
      deliverImage(listener, info, false);
    }
    previous?.dispose();
  };

  const reportError = (error: unknown): void => {
    lastError = { error };
    // Kept for replay to the next listener.
    if (listeners.length === 0) {
      return;
    }
    const handlers = listeners.filter(
      (listener) => listener.onError !== undefined
    );
    if (handlers.length === 0) {
      logError('Failed to resolve an image.', error);
      return;
    }
    for (const listener of handlers) {
      listener.onError?.(error);
    }
  };

  const release = (): void => {
    listeners = [];
    lastError = null;
    const previous = current;
    current = null;
    previous?.dispose();
  };

  return {
    addListener,
    removeListener,
    setImage,
    reportError,
    hasListeners: () => listeners.length > 0,
    release,
  };
};

/**
 * Creates a stream over a completer.
 */
export const createImageStream = <TImage extends PaintableImage, TKey>(
  key: TKey,
  completer: ImageStreamCompleter<TImage>
): ImageStream<TImage, TKey> => ({
  key,
  completer,
  addListener: completer.addListener,
  removeListener: completer.removeListener,
});

//////////////////////////////////////////////////////////////////////////////////////

const isAsyncIterable = <T>(
  value: Promise<T> | AsyncIterable<T>
): value is AsyncIterable<T> => Symbol.asyncIterator in value;

/**
 * Waits for `promise` unless `signal` aborts first.
 * A frame resolved after the abort is closed.
 */
const waitForFrame = async <TImage extends PaintableImage>(
  promise: Promise<ImageFrame<TImage>>,
  signal: AbortSignal
): Promise<ImageFrame<TImage>> => {
  const deferred = createDeferred<ImageFrame<TImage>>();
  const abortHandle = onAbort(signal, (error) => {
    deferred.reject(error);
  });
  void promise.then(
    (frame) => {
      if (signal.aborted) {
        frame.image.close?.();
        return;
      }
      deferred.resolve(frame);
    },
    (error: unknown) => {
      deferred.reject(error);
    }
  );
  try {
    return await deferred.promise;
  } finally {
    abortHandle.release();
  }
};

interface ProviderEntry<TImage extends PaintableImage, TKey> {
  readonly stream: ImageStream<TImage, TKey>;
}

/**
 * Creates an image provider from a key derivation and a loader.
 * @param init Key derivation, loader and key comparison.
 * @returns Provider. Streams of equal keys share one completer while listened to.
 * @remarks Loading starts when the first listener is added and is aborted once the last one is removed.
 */
export const createImageProvider = <TImage extends PaintableImage, TKey>(
  init: ImageProviderInit<TImage, TKey>
): ImageProvider<TImage, TKey> => {
  const keyEquals = init.keyEquals ?? Object.is;
  const entries: ProviderEntry<TImage, TKey>[] = [];

  const publish = (
    completer: ImageStreamCompleter<TImage>,
    frame: ImageFrame<TImage>,
    signal: AbortSignal
  ): void => {
    if (signal.aborted) {
      frame.image.close?.();
      return;
    }
    completer.setImage(
      createImageInfo(frame.image, {
        scale: frame.scale,
        debugLabel: frame.debugLabel,
      })
    );
  };

  const load = async (
    key: TKey,
    completer: ImageStreamCompleter<TImage>,
    signal: AbortSignal
  ): Promise<void> => {
    try {
      const result = init.load(key, signal);
      if (isAsyncIterable(result)) {
        for await (const frame of result) {
          publish(completer, frame, signal);
          if (signal.aborted) {
            break;
          }
        }
      } else {
        publish(completer, await waitForFrame(result, signal), signal);
      }
    } catch (error) {
      if (!signal.aborted) {
        completer.reportError(error);
      }
    }
  };

  const createEntry = (key: TKey): ProviderEntry<TImage, TKey> => {
    let controller: AbortController | null = null;
    const completer: ImageStreamCompleter<TImage> =
      createImageStreamCompleter<TImage>({
        onListen: () => {
          if (!entries.includes(entry)) {
            entries.push(entry);
          }
          controller = new AbortController();
          void load(key, completer, controller.signal);
        },
        onIdle: () => {
          controller?.abort();
          controller = null;
          const index = entries.indexOf(entry);
          if (index >= 0) {
            entries.splice(index, 1);
          }
          completer.release();
        },
      });
    const entry: ProviderEntry<TImage, TKey> = {
      stream: createImageStream(key, completer),
    };
    return entry;
  };

  const resolve = (
    configuration: ImageConfiguration
  ): ImageStream<TImage, TKey> => {
    const key = init.obtainKey(configuration);
    const existing = entries.find((entry) =>
      keyEquals(entry.stream.key, key)
    );
    if (existing) {
      return existing.stream;
    }
    // Only the latest unlistened entry is kept.
    for (let index = entries.length - 1; index >= 0; index--) {
      if (!entries[index]?.stream.completer.hasListeners()) {
        entries.splice(index, 1);
      }
    }
    const entry = createEntry(key);
    entries.push(entry);
    return entry.stream;
  };

  return {
    obtainKey: init.obtainKey,
    resolve,
  };
};

/**
 * Creates a provider of an already decoded image.
 * @param image Decoded image, also used as the key. The provider keeps it open.
 * @param options Scale and label.
 * @returns Provider whose streams deliver the image synchronously.
 */
export const createMemoryImageProvider = <TImage extends PaintableImage>(
  image: TImage,
  options?: ImageInfoOptions
): ImageProvider<TImage, TImage> => {
  const root = createImageInfo(image, options);
  let stream: ImageStream<TImage, TImage> | null = null;

  const resolve = (): ImageStream<TImage, TImage> => {
    if (stream) {
      return stream;
    }
    const completer: ImageStreamCompleter<TImage> =
      createImageStreamCompleter<TImage>({
        onListen: () => {
          completer.setImage(root.clone());
        },
        onIdle: () => {
          completer.release();
        },
      });
    stream = createImageStream(image, completer);
    return stream;
  };

  return {
    obtainKey: () => image,
    resolve,
  };
};
