// ImageBackend implementation on top of sharp

import sharp from 'sharp';
import { ImageIOError, describeError } from '../errors';
import type { PixelRect, Size } from '../layout/types';
import type { ImageBackend, OutputFormat, RasterImage, RgbColor } from './imageBackend';

// ============================================================================
// Helpers
// ============================================================================

function fromRaster(image: RasterImage): sharp.Sharp {
  return sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: image.channels },
  });
}

/**
 * Runs a pipeline to raw RGB. Images that come out with an alpha channel
 * (compositing adds one) are flattened in a second pass.
 */
async function toRaster(pipeline: sharp.Sharp): Promise<RasterImage> {
  const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });

  if (info.channels === 3) {
    return { data, width: info.width, height: info.height, channels: 3 };
  }
  if (info.channels === 4) {
    const rgb = await sharp(data, {
      raw: { width: info.width, height: info.height, channels: 4 },
    })
      .removeAlpha()
      .raw()
      .toBuffer();
    return { data: rgb, width: info.width, height: info.height, channels: 3 };
  }

  throw new Error(`unexpected channel count ${info.channels}`);
}

async function run<T>(operation: string, path: string | null, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof ImageIOError) {
      throw error;
    }
    const target = path ? ` ${path}` : '';
    throw new ImageIOError(`${operation} failed${target}: ${describeError(error)}`, path, error);
  }
}

// ============================================================================
// Backend
// ============================================================================

/**
 * sharp-backed image operations. Resizing uses the Lanczos3 kernel.
 */
export const sharpBackend: ImageBackend = {
  decode(path: string): Promise<RasterImage> {
    return run('decode', path, () =>
      toRaster(sharp(path).removeAlpha().toColourspace('srgb'))
    );
  },

  crop(image: RasterImage, rect: PixelRect): Promise<RasterImage> {
    return run('crop', null, () =>
      toRaster(
        fromRaster(image).extract({
          left: rect.x,
          top: rect.y,
          width: rect.width,
          height: rect.height,
        })
      )
    );
  },

  resize(image: RasterImage, size: Size): Promise<RasterImage> {
    return run('resize', null, () =>
      toRaster(
        fromRaster(image).resize(size.width, size.height, {
          fit: 'fill',
          kernel: sharp.kernel.lanczos3,
        })
      )
    );
  },

  createCanvas(size: Size, color: RgbColor): Promise<RasterImage> {
    return run('create canvas', null, () =>
      toRaster(
        sharp({
          create: {
            width: size.width,
            height: size.height,
            channels: 3,
            background: color,
          },
        })
      )
    );
  },

  paste(canvas: RasterImage, region: RasterImage, x: number, y: number): Promise<RasterImage> {
    return run('paste', null, () =>
      toRaster(
        fromRaster(canvas).composite([
          {
            input: region.data,
            raw: { width: region.width, height: region.height, channels: region.channels },
            left: x,
            top: y,
          },
        ])
      )
    );
  },

  encode(image: RasterImage, path: string, format: OutputFormat): Promise<void> {
    return run('encode', path, async () => {
      await fromRaster(image).toFormat(format).toFile(path);
    });
  },
};
