// Aspect ratio matching for the source image

import type { PixelRect, Size } from '../layout/types';

/**
 * Which crop was applied to bring the source to the layout aspect
 * - horizontal: source too wide, trim left/right (pillarbox)
 * - vertical: source too tall, trim top/bottom (letterbox)
 * - none: aspects already match within tolerance
 */
export type AspectCropMode = 'horizontal' | 'vertical' | 'none';

/**
 * Result of aspect ratio matching
 * - sourceRect: region of the source to keep
 */
export interface AspectCropResult {
  mode: AspectCropMode;
  sourceRect: PixelRect;
}

/**
 * Relative difference under which two aspect ratios count as equal.
 * Physical sizes come from square roots, so exact equality almost never holds.
 */
export const ASPECT_TOLERANCE = 1e-9;

/**
 * Calculate the centered crop that gives the source the layout's aspect ratio
 *
 * @param sourceSize - Decoded source image dimensions
 * @param layoutAspect - Physical layout width / height
 * @param tolerance - Relative tolerance for treating the aspects as equal
 * @returns Crop mode and the region of the source to keep
 */
export function calculateAspectCrop(
  sourceSize: Size,
  layoutAspect: number,
  tolerance: number = ASPECT_TOLERANCE
): AspectCropResult {
  const sourceAspect = sourceSize.width / sourceSize.height;

  if (Math.abs(sourceAspect - layoutAspect) <= tolerance * layoutAspect) {
    return {
      mode: 'none',
      sourceRect: { x: 0, y: 0, width: sourceSize.width, height: sourceSize.height },
    };
  }

  if (sourceAspect > layoutAspect) {
    // Source is wider: crop left/right
    const srcWidth = Math.min(sourceSize.width, Math.max(1, Math.round(sourceSize.height * layoutAspect)));
    return {
      mode: 'horizontal',
      sourceRect: {
        x: Math.floor((sourceSize.width - srcWidth) / 2),
        y: 0,
        width: srcWidth,
        height: sourceSize.height,
      },
    };
  }

  // Source is taller: crop top/bottom
  const srcHeight = Math.min(sourceSize.height, Math.max(1, Math.round(sourceSize.width / layoutAspect)));
  return {
    mode: 'vertical',
    sourceRect: {
      x: 0,
      y: Math.floor((sourceSize.height - srcHeight) / 2),
      width: sourceSize.width,
      height: srcHeight,
    },
  };
}

/**
 * Human-readable description of a crop mode for console output
 */
export function describeCropMode(mode: AspectCropMode): string {
  switch (mode) {
    case 'horizontal':
      return 'Cropping horizontally to match overall layout aspect.';
    case 'vertical':
      return 'Cropping vertically to match overall layout aspect.';
    case 'none':
      return 'Aspect ratio matches, no cropping needed.';
  }
}
