// Image library contract used by the compositor

import type { PixelRect, Size } from '../layout/types';

/**
 * Decoded 8-bit sRGB image, three interleaved channels, no alpha.
 */
export interface RasterImage {
  data: Buffer;
  width: number;
  height: number;
  channels: 3;
}

/**
 * 8-bit RGB color.
 */
export interface RgbColor {
  r: number;
  g: number;
  b: number;
}

/**
 * Output formats the compositor can write.
 */
export type OutputFormat = 'png' | 'jpeg' | 'webp';

/**
 * Image operations the compositor relies on. Every method may reject with
 * an ImageIOError.
 */
export interface ImageBackend {
  /** Reads and decodes an image file */
  decode(path: string): Promise<RasterImage>;
  /** Extracts a rectangular region */
  crop(image: RasterImage, rect: PixelRect): Promise<RasterImage>;
  /** Resamples to exactly the given size with a high-quality filter */
  resize(image: RasterImage, size: Size): Promise<RasterImage>;
  /** New image filled with a solid color */
  createCanvas(size: Size, color: RgbColor): Promise<RasterImage>;
  /** Returns a copy of canvas with region drawn at (x, y) */
  paste(canvas: RasterImage, region: RasterImage, x: number, y: number): Promise<RasterImage>;
  /** Encodes and writes an image file */
  encode(image: RasterImage, path: string, format: OutputFormat): Promise<void>;
}

/**
 * Size of a raster image.
 */
export function rasterSize(image: RasterImage): Size {
  return { width: image.width, height: image.height };
}

/**
 * Reads the color of one pixel.
 */
export function getPixel(image: RasterImage, x: number, y: number): RgbColor {
  const offset = (y * image.width + x) * image.channels;
  return {
    r: image.data[offset],
    g: image.data[offset + 1],
    b: image.data[offset + 2],
  };
}

/**
 * Counts pixels exactly equal to a color.
 */
export function countPixels(image: RasterImage, color: RgbColor): number {
  let count = 0;
  for (let offset = 0; offset < image.data.length; offset += image.channels) {
    if (
      image.data[offset] === color.r &&
      image.data[offset + 1] === color.g &&
      image.data[offset + 2] === color.b
    ) {
      count++;
    }
  }
  return count;
}
