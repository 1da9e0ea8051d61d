// Compositor: slices an aspect-matched source into per-monitor regions and
// stitches them into one spanned wallpaper canvas

import { getLayoutAspect } from '../layout/layoutEngine';
import type { Layout, Size } from '../layout/types';
import { calculateAspectCrop, ASPECT_TOLERANCE, type AspectCropResult } from './aspectRatio';
import {
  rasterSize,
  type ImageBackend,
  type OutputFormat,
  type RasterImage,
  type RgbColor,
} from './imageBackend';
import { buildCompositePlan, type CompositePlan } from './plan';
import { sharpBackend } from './sharpBackend';

// ============================================================================
// Configuration
// ============================================================================

/**
 * Canvas fill. Anything still this color after compositing was not covered
 * by any monitor.
 */
export const SENTINEL_COLOR: RgbColor = { r: 255, g: 0, b: 0 };

/**
 * Configuration for the Compositor
 */
export interface CompositorConfig {
  layout: Layout;
  backend: ImageBackend;
  /** Fill color for uncovered canvas areas */
  sentinelColor: RgbColor;
  /** Relative tolerance for treating source and layout aspects as equal */
  aspectTolerance: number;
}

/**
 * Output of one composite run
 */
export interface CompositeResult {
  image: RasterImage;
  /** Size of the decoded source before cropping */
  sourceSize: Size;
  crop: AspectCropResult;
  plan: CompositePlan;
}

/**
 * Creates a CompositorConfig with the sharp backend and red sentinel fill.
 */
export function createCompositorConfig(
  layout: Layout,
  overrides: Partial<Omit<CompositorConfig, 'layout'>> = {}
): CompositorConfig {
  return {
    layout,
    backend: overrides.backend ?? sharpBackend,
    sentinelColor: overrides.sentinelColor ?? SENTINEL_COLOR,
    aspectTolerance: overrides.aspectTolerance ?? ASPECT_TOLERANCE,
  };
}

// ============================================================================
// Compositor
// ============================================================================

/**
 * Compositor renders one source image across a monitor layout
 */
export class Compositor {
  private readonly layout: Layout;
  private readonly backend: ImageBackend;
  private readonly sentinelColor: RgbColor;
  private readonly aspectTolerance: number;

  constructor(config: CompositorConfig) {
    this.layout = config.layout;
    this.backend = config.backend;
    this.sentinelColor = config.sentinelColor;
    this.aspectTolerance = config.aspectTolerance;
  }

  /**
   * Get the output canvas dimensions
   */
  getCanvasSize(): Size {
    return {
      width: this.layout.totalOutputWidthPx,
      height: this.layout.outputHeightPx,
    };
  }

  /**
   * Crop the source to the layout aspect, then resample and paste each
   * monitor's slice onto a sentinel-filled canvas.
   *
   * @param source - Decoded source image
   */
  async compose(source: RasterImage): Promise<CompositeResult> {
    const sourceSize = rasterSize(source);
    const crop = calculateAspectCrop(
      sourceSize,
      getLayoutAspect(this.layout),
      this.aspectTolerance
    );

    const cropped =
      crop.mode === 'none' ? source : await this.backend.crop(source, crop.sourceRect);
    const croppedSize = rasterSize(cropped);

    const canvasSize = this.getCanvasSize();
    if (croppedSize.width < canvasSize.width || croppedSize.height < canvasSize.height) {
      console.warn(
        `[Compositor] Source ${croppedSize.width}x${croppedSize.height} (after cropping) is smaller than the output ${canvasSize.width}x${canvasSize.height}; the wallpaper will be upscaled`
      );
    }

    const plan = buildCompositePlan(this.layout, croppedSize);
    let canvas = await this.backend.createCanvas(plan.canvasSize, this.sentinelColor);

    for (const placement of plan.placements) {
      const region = await this.backend.crop(cropped, placement.sourceRect);
      const resized = await this.backend.resize(region, placement.targetSize);
      canvas = await this.backend.paste(
        canvas,
        resized,
        placement.destination.x,
        placement.destination.y
      );
    }

    return { image: canvas, sourceSize, crop, plan };
  }

  /**
   * Decode inputPath, compose, and write the result to outputPath.
   */
  async composeFile(
    inputPath: string,
    outputPath: string,
    format: OutputFormat = 'png'
  ): Promise<CompositeResult> {
    const source = await this.backend.decode(inputPath);
    const result = await this.compose(source);
    await this.backend.encode(result.image, outputPath, format);
    return result;
  }
}

/**
 * Create a compositor for the given layout
 */
export function createCompositor(
  layout: Layout,
  backend: ImageBackend = sharpBackend
): Compositor {
  return new Compositor(createCompositorConfig(layout, { backend }));
}
