// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

import { afterEach, describe, expect, it, vi } from 'vitest';

import {
  createImageInfo,
  createImageProvider,
  createImageStreamCompleter,
  createMemoryImageProvider,
} from '../src/imageStream';
import { ImagePaintingError } from '../src/errors';
import type {
  ImageFrame,
  ImageInfo,
  ImageStreamListener,
  PaintableImage,
} from '../src/types';

const createImage = (width = 4, height = 4) => ({
  width,
  height,
  close: vi.fn(),
});

type TestImage = ReturnType<typeof createImage>;

const flush = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

const errorCodeOf = (action: () => void): string | undefined => {
  try {
    action();
  } catch (error) {
    return error instanceof ImagePaintingError ? error.code : undefined;
  }
  return undefined;
};

/** Listener that keeps every delivered handle. */
const createCollectingListener = <TImage extends PaintableImage>() => {
  const received: { info: ImageInfo<TImage>; synchronousCall: boolean }[] = [];
  const errors: unknown[] = [];
  const listener: ImageStreamListener<TImage> = {
    onImage: (info, synchronousCall) => {
      received.push({ info, synchronousCall });
    },
    onError: (error) => {
      errors.push(error);
    },
  };
  return { listener, received, errors };
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe('createImageInfo', () => {
  it('closes the image once every clone is disposed', () => {
    const image = createImage();
    const info = createImageInfo(image, { scale: 2, debugLabel: 'icon' });
    const clone = info.clone();

    expect(clone.isCloneOf(info)).toBe(true);
    expect(clone.image).toBe(image);
    expect(clone.scale).toBe(2);
    expect(clone.debugLabel).toBe('icon');

    info.dispose();
    expect(info.isDisposed).toBe(true);
    expect(image.close).not.toHaveBeenCalled();
    clone.dispose();
    expect(image.close).toHaveBeenCalledTimes(1);
  });

  it('distinguishes handles with another scale or image', () => {
    const image = createImage();
    const info = createImageInfo(image);
    expect(info.isCloneOf(createImageInfo(image, { scale: 3 }))).toBe(false);
    expect(info.isCloneOf(createImageInfo(createImage()))).toBe(false);
    expect(info.isCloneOf(createImageInfo(image))).toBe(true);
  });

  it('rejects use after dispose', () => {
    const info = createImageInfo(createImage());
    info.dispose();
    expect(errorCodeOf(() => info.dispose())).toBe('image-disposed');
    expect(errorCodeOf(() => info.clone())).toBe('image-disposed');
  });
});

describe('createImageStreamCompleter', () => {
  it('delivers new images asynchronously and the current one synchronously', () => {
    const completer = createImageStreamCompleter<TestImage>();
    const first = createCollectingListener<TestImage>();
    completer.addListener(first.listener);
    expect(first.received).toHaveLength(0);

    const info = createImageInfo(createImage());
    completer.setImage(info);
    expect(first.received).toHaveLength(1);
    expect(first.received[0]?.synchronousCall).toBe(false);
    expect(first.received[0]?.info.isCloneOf(info)).toBe(true);
    expect(first.received[0]?.info).not.toBe(info);

    const second = createCollectingListener<TestImage>();
    completer.addListener(second.listener);
    expect(second.received[0]?.synchronousCall).toBe(true);
  });

  it('disposes the previous image when a new one arrives', () => {
    const completer = createImageStreamCompleter<TestImage>();
    const oldInfo = createImageInfo(createImage());
    completer.setImage(oldInfo);
    completer.setImage(createImageInfo(createImage()));
    expect(oldInfo.isDisposed).toBe(true);
    expect(oldInfo.image.close).toHaveBeenCalledTimes(1);
  });

  it('reports errors to listeners and replays them to late listeners', () => {
    const completer = createImageStreamCompleter<TestImage>();
    const early = createCollectingListener<TestImage>();
    completer.addListener(early.listener);
    const failure = new Error('decode failed');
    completer.reportError(failure);
    expect(early.errors).toEqual([failure]);

    const late = createCollectingListener<TestImage>();
    completer.addListener(late.listener);
    expect(late.errors).toEqual([failure]);
  });

  it('logs errors nobody handles', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const completer = createImageStreamCompleter<TestImage>();
    completer.addListener({ onImage: () => {} });
    const failure = new Error('decode failed');
    completer.reportError(failure);
    expect(error).toHaveBeenCalledWith(
      '[canvas-blend-painter] Failed to resolve an image.',
      failure
    );
  });

  it('keeps errors reported before any listener for replay without logging them', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const completer = createImageStreamCompleter<TestImage>();
    const failure = new Error('decode failed');
    completer.reportError(failure);
    expect(error).not.toHaveBeenCalled();

    const late = createCollectingListener<TestImage>();
    completer.addListener(late.listener);
    expect(late.errors).toEqual([failure]);
  });

  it('releases the handle a throwing listener was given', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const completer = createImageStreamCompleter<TestImage>();
    completer.addListener({
      onImage: () => {
        throw new Error('listener failed');
      },
    });
    const info = createImageInfo(createImage());
    completer.setImage(info);
    completer.release();
    expect(info.image.close).toHaveBeenCalledTimes(1);
  });

  it('signals the first and last listener', () => {
    const onListen = vi.fn();
    const onIdle = vi.fn();
    const completer = createImageStreamCompleter<TestImage>({
      onListen,
      onIdle,
    });
    const a = createCollectingListener<TestImage>();
    const b = createCollectingListener<TestImage>();

    completer.addListener(a.listener);
    completer.addListener(b.listener);
    expect(onListen).toHaveBeenCalledTimes(1);
    expect(completer.hasListeners()).toBe(true);

    completer.removeListener(a.listener);
    completer.removeListener(a.listener);
    expect(onIdle).not.toHaveBeenCalled();
    completer.removeListener(b.listener);
    expect(onIdle).toHaveBeenCalledTimes(1);
    expect(completer.hasListeners()).toBe(false);
  });

  it('disposes the current image on release', () => {
    const completer = createImageStreamCompleter<TestImage>();
    const info = createImageInfo(createImage());
    completer.setImage(info);
    completer.release();
    expect(info.isDisposed).toBe(true);
  });
});

describe('createImageProvider', () => {
  it('loads on the first listener and publishes the frame', async () => {
    const image = createImage();
    let resolveFrame: (frame: ImageFrame<TestImage>) => void = () => {};
    const load = vi.fn(
      (_key: string, _signal: AbortSignal) =>
        new Promise<ImageFrame<TestImage>>((resolve) => {
          resolveFrame = resolve;
        })
    );
    const provider = createImageProvider<TestImage, string>({
      obtainKey: () => 'asset',
      load,
    });

    const stream = provider.resolve({});
    expect(stream.key).toBe('asset');
    expect(load).not.toHaveBeenCalled();

    const collector = createCollectingListener<TestImage>();
    stream.addListener(collector.listener);
    expect(load).toHaveBeenCalledTimes(1);
    expect(load.mock.calls[0]?.[0]).toBe('asset');

    resolveFrame({ image, scale: 2, debugLabel: 'asset' });
    await flush();

    expect(collector.received).toHaveLength(1);
    expect(collector.received[0]?.info.image).toBe(image);
    expect(collector.received[0]?.info.scale).toBe(2);
    expect(collector.received[0]?.synchronousCall).toBe(false);
  });

  it('shares streams for equal keys', () => {
    const provider = createImageProvider<TestImage, { id: number }>({
      obtainKey: (configuration) => ({ id: configuration.devicePixelRatio ?? 1 }),
      load: () => new Promise<ImageFrame<TestImage>>(() => {}),
      keyEquals: (a, b) => a.id === b.id,
    });
    const first = provider.resolve({ devicePixelRatio: 2 });
    expect(provider.resolve({ devicePixelRatio: 2 })).toBe(first);
    expect(provider.resolve({ devicePixelRatio: 3 })).not.toBe(first);
  });

  it('aborts loading once the last listener leaves', async () => {
    const image = createImage();
    let signal: AbortSignal | undefined;
    let resolveFrame: (frame: ImageFrame<TestImage>) => void = () => {};
    const provider = createImageProvider<TestImage, string>({
      obtainKey: () => 'asset',
      load: (_key, loadSignal) => {
        signal = loadSignal;
        return new Promise<ImageFrame<TestImage>>((resolve) => {
          resolveFrame = resolve;
        });
      },
    });

    const stream = provider.resolve({});
    const collector = createCollectingListener<TestImage>();
    stream.addListener(collector.listener);
    stream.removeListener(collector.listener);
    expect(signal?.aborted).toBe(true);

    resolveFrame({ image });
    await flush();
    expect(collector.received).toHaveLength(0);
    expect(collector.errors).toHaveLength(0);
    expect(image.close).toHaveBeenCalledTimes(1);
    expect(provider.resolve({})).not.toBe(stream);
  });

  it('publishes every frame of an async iterable', async () => {
    const frames = [createImage(), createImage()];
    async function* animate(): AsyncGenerator<ImageFrame<TestImage>> {
      yield { image: frames[0] ?? createImage() };
      yield { image: frames[1] ?? createImage(), scale: 2 };
    }
    const provider = createImageProvider<TestImage, string>({
      obtainKey: () => 'animation',
      load: () => animate(),
    });

    const collector = createCollectingListener<TestImage>();
    provider.resolve({}).addListener(collector.listener);
    await flush();

    expect(collector.received.map((entry) => entry.info.image)).toEqual(
      frames
    );
    expect(collector.received[1]?.info.scale).toBe(2);
  });

  it('reports a synchronous load failure only to the listener', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const failure = new Error('bad key');
    const provider = createImageProvider<TestImage, string>({
      obtainKey: () => 'broken',
      load: () => {
        throw failure;
      },
    });
    const collector = createCollectingListener<TestImage>();
    provider.resolve({}).addListener(collector.listener);
    expect(collector.errors).toEqual([failure]);
    expect(error).not.toHaveBeenCalled();
  });

  it('drops unlistened streams once another key is resolved', () => {
    const provider = createImageProvider<TestImage, number>({
      obtainKey: (configuration) => configuration.devicePixelRatio ?? 1,
      load: () => new Promise<ImageFrame<TestImage>>(() => {}),
    });
    const listened = provider.resolve({ devicePixelRatio: 1 });
    listened.addListener(createCollectingListener<TestImage>().listener);
    const unlistened = provider.resolve({ devicePixelRatio: 2 });

    provider.resolve({ devicePixelRatio: 3 });

    expect(provider.resolve({ devicePixelRatio: 1 })).toBe(listened);
    expect(provider.resolve({ devicePixelRatio: 2 })).not.toBe(unlistened);
  });

  it('forwards load failures to listeners', async () => {
    const failure = new Error('not found');
    const provider = createImageProvider<TestImage, string>({
      obtainKey: () => 'missing',
      load: () => Promise.reject(failure),
    });
    const collector = createCollectingListener<TestImage>();
    provider.resolve({}).addListener(collector.listener);
    await flush();
    expect(collector.errors).toEqual([failure]);
  });
});

describe('createMemoryImageProvider', () => {
  it('delivers the image synchronously and keeps it open', () => {
    const image = createImage();
    const provider = createMemoryImageProvider(image, { scale: 2 });
    expect(provider.obtainKey({})).toBe(image);

    const stream = provider.resolve({});
    expect(provider.resolve({})).toBe(stream);

    const collector = createCollectingListener<TestImage>();
    stream.addListener(collector.listener);
    expect(collector.received).toHaveLength(1);
    expect(collector.received[0]?.synchronousCall).toBe(true);
    expect(collector.received[0]?.info.scale).toBe(2);

    collector.received[0]?.info.dispose();
    stream.removeListener(collector.listener);
    expect(image.close).not.toHaveBeenCalled();

    const again = createCollectingListener<TestImage>();
    stream.addListener(again.listener);
    expect(again.received[0]?.synchronousCall).toBe(true);
  });
});
