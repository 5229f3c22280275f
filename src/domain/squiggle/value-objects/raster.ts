import { AppError } from '../../../shared/errors/app-error.js';

export interface RgbColor {
  readonly r: number;
  readonly g: number;
  readonly b: number;
}

/** Index into a raster's palette. */
export type ColorIndex = number;

export interface RgbaDecodeOptions {
  /** Color given to pixels whose alpha is below 128. */
  readonly matte?: RgbColor;
}

const WHITE: RgbColor = { r: 255, g: 255, b: 255 };

const packRgb = (color: RgbColor): number => (color.r << 16) | (color.g << 8) | color.b;

/**
 * Palette-indexed pixel grid. Everything except {@link IndexedRaster.setColor}
 * and {@link IndexedRaster.fillRegion} is read-only; those two are reserved for
 * the code that owns a freshly built or exclusively held raster.
 */
export class IndexedRaster {
  public readonly width: number;

  public readonly height: number;

  public readonly palette: readonly RgbColor[];

  private readonly pixels: Uint32Array;

  private constructor(width: number, height: number, palette: readonly RgbColor[], pixels: Uint32Array) {
    this.width = width;
    this.height = height;
    this.palette = palette;
    this.pixels = pixels;
  }

  public static create(
    width: number,
    height: number,
    palette: readonly RgbColor[],
    pixels: ArrayLike<number>,
  ): IndexedRaster {
    IndexedRaster.assertDimensions(width, height);

    if (pixels.length !== width * height) {
      throw AppError.malformedRaster('Pixel buffer does not match raster dimensions', {
        width,
        height,
        length: pixels.length,
      });
    }

    const indices = Uint32Array.from(pixels);
    for (const index of indices) {
      if (index >= palette.length) {
        throw AppError.malformedRaster('Pixel refers to a color outside the palette', {
          index,
          paletteSize: palette.length,
        });
      }
    }

    return new IndexedRaster(width, height, [...palette], indices);
  }

  public static filled(
    width: number,
    height: number,
    palette: readonly RgbColor[],
    color: ColorIndex,
  ): IndexedRaster {
    IndexedRaster.assertDimensions(width, height);

    if (color < 0 || color >= palette.length) {
      throw AppError.malformedRaster('Fill color is outside the palette', {
        color,
        paletteSize: palette.length,
      });
    }

    return new IndexedRaster(width, height, [...palette], new Uint32Array(width * height).fill(color));
  }

  /**
   * Indexes an RGBA buffer. The palette lists each distinct color once, in
   * row-major order of first appearance.
   */
  public static fromRgba(
    width: number,
    height: number,
    data: ArrayLike<number>,
    options: RgbaDecodeOptions = {},
  ): IndexedRaster {
    IndexedRaster.assertDimensions(width, height);

    if (data.length !== width * height * 4) {
      throw AppError.malformedRaster('RGBA buffer does not match raster dimensions', {
        width,
        height,
        length: data.length,
      });
    }

    const matte = options.matte ?? WHITE;
    const palette: RgbColor[] = [];
    const lookup = new Map<number, ColorIndex>();
    const pixels = new Uint32Array(width * height);

    for (let pixel = 0; pixel < pixels.length; pixel += 1) {
      const offset = pixel * 4;
      const opaque = (data[offset + 3] ?? 255) >= 128;
      const color: RgbColor = opaque
        ? { r: data[offset] ?? 0, g: data[offset + 1] ?? 0, b: data[offset + 2] ?? 0 }
        : matte;

      const key = packRgb(color);
      let index = lookup.get(key);
      if (index === undefined) {
        index = palette.length;
        palette.push(color);
        lookup.set(key, index);
      }
      pixels[pixel] = index;
    }

    return new IndexedRaster(width, height, palette, pixels);
  }

  private static assertDimensions(width: number, height: number): void {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw AppError.malformedRaster('Raster dimensions must be positive integers', { width, height });
    }
  }

  public contains(x: number, y: number): boolean {
    return x >= 0 && y >= 0 && x < this.width && y < this.height;
  }

  public colorAt(x: number, y: number): ColorIndex {
    this.assertInside(x, y);
    return this.pixels[y * this.width + x] ?? 0;
  }

  public rgbAt(x: number, y: number): RgbColor {
    const color = this.palette[this.colorAt(x, y)];
    if (!color) {
      throw AppError.malformedRaster('Pixel refers to a color outside the palette', { x, y });
    }
    return color;
  }

  public setColor(x: number, y: number, color: ColorIndex): void {
    this.assertInside(x, y);
    this.pixels[y * this.width + x] = color;
  }

  /** Exact RGB lookup in the palette. */
  public findClearColor(r: number, g: number, b: number): ColorIndex | undefined {
    const key = packRgb({ r, g, b });
    const index = this.palette.findIndex((color) => packRgb(color) === key);
    return index === -1 ? undefined : index;
  }

  /**
   * Replaces the 4-connected region of same-colored pixels around (x, y) with
   * `color`. Returns the number of pixels changed.
   */
  public fillRegion(x: number, y: number, color: ColorIndex): number {
    const target = this.colorAt(x, y);
    if (target === color) {
      return 0;
    }

    const { width, height, pixels } = this;
    const stack: number[] = [y * width + x];
    let filled = 0;

    while (stack.length > 0) {
      const offset = stack.pop();
      if (offset === undefined || pixels[offset] !== target) {
        continue;
      }

      pixels[offset] = color;
      filled += 1;

      const px = offset % width;
      const py = (offset - px) / width;
      if (px > 0) stack.push(offset - 1);
      if (px < width - 1) stack.push(offset + 1);
      if (py > 0) stack.push(offset - width);
      if (py < height - 1) stack.push(offset + width);
    }

    return filled;
  }

  public countColor(color: ColorIndex): number {
    let count = 0;
    for (const pixel of this.pixels) {
      if (pixel === color) {
        count += 1;
      }
    }
    return count;
  }

  /** Copy of the pixel indices in row-major order. */
  public toIndices(): Uint32Array {
    return new Uint32Array(this.pixels);
  }

  private assertInside(x: number, y: number): void {
    if (!this.contains(x, y)) {
      throw AppError.malformedRaster('Pixel coordinate outside raster bounds', {
        x,
        y,
        width: this.width,
        height: this.height,
      });
    }
  }
}
