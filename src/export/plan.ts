// Composite plan: where each monitor samples the source and lands on the canvas

import { computeSampleRegions, toPixelRect } from '../layout/layoutEngine';
import type { Layout, NormalizedRect, PixelPoint, PixelRect, Size } from '../layout/types';

/**
 * One monitor's contribution to the composite.
 */
export interface MonitorPlacement {
  /** Monitor index, left to right */
  index: number;
  /** Fraction of the physical layout the monitor shows */
  region: NormalizedRect;
  /** Region of the aspect-matched source to sample */
  sourceRect: PixelRect;
  /** Size the sampled region is resampled to */
  targetSize: Size;
  /** Top-left corner on the output canvas */
  destination: PixelPoint;
}

/**
 * Full plan for one composite.
 */
export interface CompositePlan {
  canvasSize: Size;
  placements: MonitorPlacement[];
}

/**
 * Builds the composite plan for a source that already has the layout's
 * aspect ratio.
 *
 * Monitors are placed edge to edge and bottom-aligned on the canvas.
 * Vertical offsets only affect which band of the source is sampled, not
 * where it is pasted.
 *
 * @param layout - Computed layout
 * @param sourceSize - Size of the aspect-matched source image
 */
export function buildCompositePlan(layout: Layout, sourceSize: Size): CompositePlan {
  const regions = computeSampleRegions(layout);
  const placements: MonitorPlacement[] = [];
  let currentX = 0;

  layout.monitors.forEach((monitor, index) => {
    const region = regions[index];
    placements.push({
      index,
      region,
      sourceRect: toPixelRect(region, sourceSize),
      targetSize: { width: monitor.widthScaledPx, height: monitor.heightScaledPx },
      destination: { x: currentX, y: layout.outputHeightPx - monitor.heightScaledPx },
    });
    currentX += monitor.widthScaledPx;
  });

  return {
    canvasSize: { width: layout.totalOutputWidthPx, height: layout.outputHeightPx },
    placements,
  };
}
