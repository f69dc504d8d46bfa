// maplibre-gl-layers - MapLibre's layer extension library enabling
// the display, movement, and modification of large numbers of dynamic sprite images
// Copyright (c) Kouji Matsui (@kekyo@mi.kekyo.net)
// Under MIT
// https://github.com/kekyo/maplibre-gl-layers

/**
 * This file exposes public API definitions only.
 */

//////////////////////////////////////////////////////////////////////////////////////////

/**
 * Two dimensional offset in logical pixels.
 */
export interface Offset {
  readonly x: number;
  readonly y: number;
}

/**
 * Two dimensional size in logical pixels.
 */
export interface Size {
  readonly width: number;
  readonly height: number;
}

/**
 * Axis aligned rectangle. `width`/`height` may be zero or negative, such rectangles are empty.
 */
export interface Rect {
  readonly left: number;
  readonly top: number;
  readonly width: number;
  readonly height: number;
}

/**
 * Reading direction used to resolve directional alignments and mirrored images.
 */
export type TextDirection = 'ltr' | 'rtl';

//////////////////////////////////////////////////////////////////////////////////////////

/**
 * Point within a rectangle.
 * x: -1.0 at left, 0.0 center, 1.0 right. y: -1.0 top, 0.0 center, 1.0 bottom.
 * Values outside the range are accepted and place the point outside the rectangle.
 */
export interface Alignment {
  readonly x: number;
  readonly y: number;
}

/**
 * Alignment whose horizontal component depends on the text direction.
 * `start` is -1.0 at the start edge (left in ltr, right in rtl) and 1.0 at the end edge.
 */
export interface AlignmentDirectional {
  readonly start: number;
  readonly y: number;
}

/**
 * Either a plain or a directional alignment.
 */
export type AlignmentGeometry = Alignment | AlignmentDirectional;

/**
 * How a box is inscribed into another box.
 * - `fill`: distort the aspect ratio to fill the target.
 * - `contain`: as large as possible while still fully inside the target.
 * - `cover`: as small as possible while still covering the whole target.
 * - `fit-width`: the source width matches the target width.
 * - `fit-height`: the source height matches the target height.
 * - `none`: no scaling, clipped to the target.
 * - `scale-down`: `none` unless the source is larger, then `contain`.
 */
export type BoxFit =
  | 'fill'
  | 'contain'
  | 'cover'
  | 'fit-width'
  | 'fit-height'
  | 'none'
  | 'scale-down';

/**
 * Result of applying a {@link BoxFit}.
 */
export interface FittedSizes {
  /** Portion of the input that is shown. */
  readonly source: Size;
  /** Area of the output the shown portion is drawn into. */
  readonly destination: Size;
}

/**
 * How an image that does not fill its box is repeated.
 */
export type ImageRepeat = 'repeat' | 'repeat-x' | 'repeat-y' | 'no-repeat';

/**
 * Sampling quality used when an image is scaled.
 * `none` is nearest-neighbor, `low` bilinear, `medium` and `high` progressively better.
 */
export type FilterQuality = 'none' | 'low' | 'medium' | 'high';

/**
 * Compositing algorithm used when painting onto the canvas.
 */
export type BlendMode =
  | 'clear'
  | 'src'
  | 'dst'
  | 'src-over'
  | 'dst-over'
  | 'src-in'
  | 'dst-in'
  | 'src-out'
  | 'dst-out'
  | 'src-atop'
  | 'dst-atop'
  | 'xor'
  | 'plus'
  | 'modulate'
  | 'screen'
  | 'overlay'
  | 'darken'
  | 'lighten'
  | 'color-dodge'
  | 'color-burn'
  | 'hard-light'
  | 'soft-light'
  | 'difference'
  | 'exclusion'
  | 'multiply'
  | 'hue'
  | 'saturation'
  | 'color'
  | 'luminosity';

//////////////////////////////////////////////////////////////////////////////////////////

/**
 * Blends a constant color into every pixel.
 */
export interface ModeColorFilter {
  readonly type: 'mode';
  /** CSS color string. */
  readonly color: string;
  /** The color is the source, the pixel is the destination. */
  readonly blendMode: BlendMode;
}

/**
 * Applies a 5x4 color matrix, row-major.
 * Each output channel is `m[0]*R + m[1]*G + m[2]*B + m[3]*A + m[4]`, with offsets in 0..255.
 */
export interface MatrixColorFilter {
  readonly type: 'matrix';
  readonly matrix: readonly number[];
}

/**
 * Converts linear color values to the sRGB transfer curve.
 */
export interface LinearToSrgbGammaColorFilter {
  readonly type: 'linear-to-srgb-gamma';
}

/**
 * Converts sRGB color values to linear.
 */
export interface SrgbToLinearGammaColorFilter {
  readonly type: 'srgb-to-linear-gamma';
}

/**
 * Color filter applied while painting.
 */
export type ColorFilter =
  | ModeColorFilter
  | MatrixColorFilter
  | LinearToSrgbGammaColorFilter
  | SrgbToLinearGammaColorFilter;

//////////////////////////////////////////////////////////////////////////////////////////

/**
 * Decoded bitmap that can be painted.
 * `ImageBitmap`, `HTMLImageElement` and `HTMLCanvasElement` satisfy this interface.
 */
export interface PaintableImage {
  readonly width: number;
  readonly height: number;
  /** Releases the bitmap. Called when the last image handle is disposed. */
  close?(): void;
  /** Reports whether the bitmap has been released. */
  isDisposed?(): boolean;
}

/**
 * Drawing attributes applied to a single draw call or layer.
 */
export interface ImagePaint {
  readonly blendMode: BlendMode;
  /** 0.0 (transparent) to 1.0 (opaque). */
  readonly opacity: number;
  readonly colorFilter?: ColorFilter;
  readonly filterQuality: FilterQuality;
  /** Inverts colors after the color filter. */
  readonly invertColors: boolean;
  readonly isAntiAlias: boolean;
}

/**
 * Single path segment command.
 */
export type PathCommand =
  | { readonly type: 'moveTo'; readonly x: number; readonly y: number }
  | { readonly type: 'lineTo'; readonly x: number; readonly y: number }
  | {
      readonly type: 'quadraticCurveTo';
      readonly cpx: number;
      readonly cpy: number;
      readonly x: number;
      readonly y: number;
    }
  | {
      readonly type: 'bezierCurveTo';
      readonly cp1x: number;
      readonly cp1y: number;
      readonly cp2x: number;
      readonly cp2y: number;
      readonly x: number;
      readonly y: number;
    }
  | { readonly type: 'rect'; readonly rect: Rect }
  | {
      readonly type: 'ellipse';
      readonly x: number;
      readonly y: number;
      readonly radiusX: number;
      readonly radiusY: number;
    }
  | { readonly type: 'closePath' };

/**
 * Immutable path used for clipping.
 */
export interface PaintPath {
  readonly commands: readonly PathCommand[];
}

/**
 * Drawing surface the painter issues its calls to.
 * @param TImage Bitmap type accepted by the surface.
 */
export interface PaintCanvas<TImage extends PaintableImage = PaintableImage> {
  readonly save: () => void;
  /**
   * Saves the state and redirects subsequent drawing to a layer composited with `paint` on restore.
   * @param bounds Layer bounds hint, or `null` for unbounded.
   */
  readonly saveLayer: (bounds: Rect | null, paint: ImagePaint) => void;
  readonly restore: () => void;
  readonly translate: (dx: number, dy: number) => void;
  readonly scale: (sx: number, sy?: number) => void;
  readonly clipRect: (rect: Rect) => void;
  readonly clipPath: (path: PaintPath, isAntiAlias?: boolean) => void;
  /**
   * Draws the `src` portion of the image into `dst`.
   */
  readonly drawImageRect: (
    image: TImage,
    src: Rect,
    dst: Rect,
    paint: ImagePaint
  ) => void;
  /**
   * Draws the image as a nine-patch. `center` is in image pixels.
   * Corners stay unscaled, edges and center stretch to cover `dst`.
   */
  readonly drawImageNine: (
    image: TImage,
    center: Rect,
    dst: Rect,
    paint: ImagePaint
  ) => void;
}

//////////////////////////////////////////////////////////////////////////////////////////

/**
 * Size information reported for each painted image.
 */
export interface ImageSizeInfo {
  /** Label of the image, or a synthesized `<Unknown Image(w×h)>`. */
  readonly source: string;
  /** Decoded size of the image in physical pixels. */
  readonly imageSize: Size;
  /** Display size in physical pixels. */
  readonly displaySize: Size;
  /** Bytes used by the decoded image, assuming RGBA8 and mipmaps. */
  readonly decodedSizeInBytes: number;
  /** Bytes that a display-sized decode would use. */
  readonly displaySizeInBytes: number;
}

/**
 * Collects image size information across a frame.
 */
export interface ImageSizeReporter {
  /** Records an entry for the current frame. */
  readonly report: (info: ImageSizeInfo) => void;
  /**
   * Ends the frame.
   * @returns Entries reported during the frame keyed by source, or `null` when nothing was reported.
   */
  readonly flushFrame: () => ReadonlyMap<string, ImageSizeInfo> | null;
  /** Forgets what the last flushed frame contained. */
  readonly resetLastFrame: () => void;
  /** Entries pending for the current frame. */
  readonly getPending: () => ReadonlyMap<string, ImageSizeInfo>;
}

/**
 * Debug settings applied by {@link paintImage}.
 */
export interface ImagePaintingDebugSettings {
  /** Report image size information for painted images. Defaults to true. */
  trackImageSizes: boolean;
  /** Invert and flip images decoded much larger than displayed. Defaults to false. */
  invertOversizedImages: boolean;
  /** Bytes a decoded image may exceed its display size by before it counts as oversized. */
  imageOverheadAllowance: number;
  /** Called for every reported size info. */
  onPaintImage?: (info: ImageSizeInfo) => void;
}

//////////////////////////////////////////////////////////////////////////////////////////

/**
 * Options for {@link paintImage}.
 */
export interface PaintImageOptions<TImage extends PaintableImage> {
  /** Canvas the image is painted onto. */
  readonly canvas: PaintCanvas<TImage>;
  /** Region painted into. Nothing is painted when empty. */
  readonly rect: Rect;
  readonly image: TImage;
  readonly blendMode: BlendMode;
  /** Label used for size reporting. */
  readonly debugImageLabel?: string;
  /** Image pixels per logical pixel. Defaults to 1. */
  readonly scale?: number;
  /** Defaults to 1. */
  readonly opacity?: number;
  readonly colorFilter?: ColorFilter;
  /** Defaults to `scale-down`, or `fill` when `centerSlice` is given. */
  readonly fit?: BoxFit;
  /** Defaults to center. */
  readonly alignment?: Alignment;
  /** Center region of a nine-patch, in logical pixels of the image. */
  readonly centerSlice?: Rect;
  /** Defaults to `no-repeat`. */
  readonly repeat?: ImageRepeat;
  readonly flipHorizontally?: boolean;
  readonly invertColors?: boolean;
  /** Defaults to `low`. */
  readonly filterQuality?: FilterQuality;
  readonly isAntiAlias?: boolean;
  /** Physical pixels per logical pixel, used for size reporting. Defaults to 1. */
  readonly devicePixelRatio?: number;
  /** Size reporter, the shared one when omitted. */
  readonly sizeReporter?: ImageSizeReporter;
}

/**
 * Geometry {@link paintImage} drew with.
 */
export interface PaintImageResult {
  /** Fundamental destination rectangle. */
  readonly destinationRect: Rect;
  /** Source rectangle in image pixels, `null` for nine-patch painting. */
  readonly sourceRect: Rect | null;
  /** Rectangles drawn into, in canvas coordinates before any flip. */
  readonly tileRects: readonly Rect[];
  /** Repeat mode after collapsing an exact fill to `no-repeat`. */
  readonly repeat: ImageRepeat;
}

//////////////////////////////////////////////////////////////////////////////////////////

/**
 * Environment an image is resolved and painted in.
 */
export interface ImageConfiguration {
  /** Physical pixels per logical pixel. */
  readonly devicePixelRatio?: number;
  readonly textDirection?: TextDirection;
  /** Size the image will be painted at. */
  readonly size?: Size;
}

/**
 * Handle to a decoded image together with its scale.
 * Clones share the bitmap, which is released after every handle is disposed.
 */
export interface ImageInfo<TImage extends PaintableImage = PaintableImage> {
  readonly image: TImage;
  /** Image pixels per logical pixel. */
  readonly scale: number;
  readonly debugLabel: string | undefined;
  readonly isDisposed: boolean;
  /** Creates another handle to the same bitmap. */
  readonly clone: () => ImageInfo<TImage>;
  /** True when both handles refer to the same bitmap with the same scale and label. */
  readonly isCloneOf: (other: ImageInfo<TImage>) => boolean;
  readonly dispose: () => void;
}

/**
 * Receives images and errors from an {@link ImageStream}.
 */
export interface ImageStreamListener<
  TImage extends PaintableImage = PaintableImage,
> {
  /**
   * Called with an image handle owned by the listener.
   * `synchronousCall` is true when delivered from inside `addListener`.
   */
  readonly onImage: (info: ImageInfo<TImage>, synchronousCall: boolean) => void;
  readonly onError?: (error: unknown) => void;
}

/**
 * Produces the images of a stream and dispatches them to listeners.
 */
export interface ImageStreamCompleter<
  TImage extends PaintableImage = PaintableImage,
> {
  readonly addListener: (listener: ImageStreamListener<TImage>) => void;
  readonly removeListener: (listener: ImageStreamListener<TImage>) => void;
  /** Publishes a new frame; the completer takes ownership of `info`. */
  readonly setImage: (info: ImageInfo<TImage>) => void;
  readonly reportError: (error: unknown) => void;
  readonly hasListeners: () => boolean;
  /** Disposes the current image and drops every listener. */
  readonly release: () => void;
}

/**
 * Stream of images resolved for one key.
 */
export interface ImageStream<
  TImage extends PaintableImage = PaintableImage,
  TKey = unknown,
> {
  readonly key: TKey;
  readonly completer: ImageStreamCompleter<TImage>;
  readonly addListener: (listener: ImageStreamListener<TImage>) => void;
  readonly removeListener: (listener: ImageStreamListener<TImage>) => void;
}

/**
 * Identifies an image and resolves it into a stream.
 */
export interface ImageProvider<
  TImage extends PaintableImage = PaintableImage,
  TKey = unknown,
> {
  readonly obtainKey: (configuration: ImageConfiguration) => TKey;
  readonly resolve: (
    configuration: ImageConfiguration
  ) => ImageStream<TImage, TKey>;
}

/**
 * Frames produced by an image loader.
 */
export interface ImageFrame<TImage extends PaintableImage = PaintableImage> {
  readonly image: TImage;
  /** Defaults to 1. */
  readonly scale?: number;
  readonly debugLabel?: string;
}

/**
 * Options for {@link createImageProvider}.
 */
export interface ImageProviderInit<TImage extends PaintableImage, TKey> {
  /** Derives the cache key for a configuration. */
  readonly obtainKey: (configuration: ImageConfiguration) => TKey;
  /**
   * Loads the image for a key. An async iterable publishes every yielded frame (animated images).
   * @param key Key returned from `obtainKey`.
   * @param signal Aborted once the stream has no more listeners.
   */
  readonly load: (
    key: TKey,
    signal: AbortSignal
  ) => Promise<ImageFrame<TImage>> | AsyncIterable<ImageFrame<TImage>>;
  /** Key comparison, `Object.is` by default. */
  readonly keyEquals?: (a: TKey, b: TKey) => boolean;
}

//////////////////////////////////////////////////////////////////////////////////////////

/**
 * Configuration of an image painted as part of a decoration.
 */
export interface DecorationImage<
  TImage extends PaintableImage = PaintableImage,
> {
  readonly image: ImageProvider<TImage>;
  /** Receives provider errors. */
  readonly onError?: (error: unknown) => void;
  readonly colorFilter?: ColorFilter;
  readonly fit?: BoxFit;
  /** Defaults to center. */
  readonly alignment?: AlignmentGeometry;
  readonly centerSlice?: Rect;
  /** Defaults to `no-repeat`. */
  readonly repeat?: ImageRepeat;
  /** Mirror the image when the text direction is rtl. Requires a text direction. */
  readonly matchTextDirection?: boolean;
  /** Multiplied with the image's own scale. Defaults to 1. */
  readonly scale?: number;
  /** Defaults to 1. */
  readonly opacity?: number;
  /** Defaults to `low`. */
  readonly filterQuality?: FilterQuality;
  readonly invertColors?: boolean;
  readonly isAntiAlias?: boolean;
}

/**
 * Paints a {@link DecorationImage}, tracking its image stream.
 */
export interface DecorationImagePainter<
  TImage extends PaintableImage = PaintableImage,
> {
  readonly details: DecorationImage<TImage>;
  /**
   * Paints the image into `rect`, clipped to `clipPath` when given.
   * Nothing is painted until the image has been resolved.
   */
  readonly paint: (
    canvas: PaintCanvas<TImage>,
    rect: Rect,
    clipPath: PaintPath | null,
    configuration: ImageConfiguration,
    blendMode: BlendMode
  ) => void;
  /** Releases the listener and the held image. The painter is unusable afterwards. */
  readonly dispose: () => void;
  /** Human readable summary of the painter state. */
  readonly describe: () => string;
}
