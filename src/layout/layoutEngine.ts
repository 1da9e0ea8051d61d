// Layout engine: physical bounding box, output canvas size and sample regions
// Pure functions, no I/O.

import { ConfigError } from '../errors';
import { computeMonitorGeometry } from './monitor';
import type {
  Layout,
  LayoutConfig,
  MonitorGeometry,
  MonitorSpec,
  NormalizedRect,
  PixelRect,
  Size,
} from './types';

// ============================================================================
// Layout
// ============================================================================

/**
 * Computes the overall layout of a left-to-right monitor row.
 *
 * Physical space: monitors sit side by side separated by gaps, bottoms
 * measured from a shared baseline at y=0. The layout is as tall as the
 * highest monitor top (height + bottom offset).
 *
 * Pixel space: scaled footprints are placed edge to edge, gaps are not
 * represented. The canvas is as tall as the tallest scaled footprint.
 *
 * @throws ConfigError on a gap count mismatch, an invalid monitor or gap,
 *   or a degenerate layout
 */
export function computeLayout(
  monitors: ReadonlyArray<MonitorSpec>,
  gapsIn: ReadonlyArray<number>
): Layout {
  if (monitors.length === 0) {
    throw new ConfigError('at least one monitor is required');
  }
  if (gapsIn.length !== monitors.length - 1) {
    throw new ConfigError(
      `gaps must have one less element than monitors (got ${gapsIn.length} gaps for ${monitors.length} monitors)`
    );
  }
  gapsIn.forEach((gap, i) => {
    if (!Number.isFinite(gap) || gap < 0) {
      throw new ConfigError(`gap ${i} must be a non-negative number, got ${gap}`);
    }
  });

  const geometries = monitors.map((spec, i) => computeMonitorGeometry(spec, i));

  const totalWidthIn =
    sum(geometries.map((m) => m.widthIn)) + sum(gapsIn);
  const maxHeightIn = Math.max(
    ...geometries.map((m) => m.heightIn + m.spec.offsetBottomIn)
  );

  const layout: Layout = Object.freeze({
    monitors: Object.freeze(geometries),
    gapsIn: Object.freeze([...gapsIn]),
    totalWidthIn,
    maxHeightIn,
    totalOutputWidthPx: sum(geometries.map((m) => m.widthScaledPx)),
    outputHeightPx: Math.max(...geometries.map((m) => m.heightScaledPx)),
  });

  assertNonDegenerate(layout);
  return layout;
}

/**
 * Convenience overload taking the config structure directly.
 */
export function computeLayoutFromConfig(config: LayoutConfig): Layout {
  return computeLayout(config.monitors, config.gapsIn);
}

/**
 * Width over height of the physical layout.
 */
export function getLayoutAspect(layout: Layout): number {
  assertNonDegenerate(layout);
  return layout.totalWidthIn / layout.maxHeightIn;
}

// ============================================================================
// Sample Regions
// ============================================================================

/**
 * Fraction of the overall physical layout a monitor shows.
 *
 * Horizontally the monitor spans [x, x + width] inches of the layout width.
 * Vertically its bottom sits offsetBottom above the baseline, so in
 * top-to-bottom fractions: bottom = 1 - offset / maxHeight and
 * top = bottom - height / maxHeight.
 *
 * @param monitor - Monitor geometry from the layout
 * @param layout - Layout the monitor belongs to
 * @param runningInchX - Distance of the monitor's left edge from the layout's left edge
 */
export function computeMonitorSampleRegion(
  monitor: MonitorGeometry,
  layout: Layout,
  runningInchX: number
): NormalizedRect {
  assertNonDegenerate(layout);

  const { totalWidthIn, maxHeightIn } = layout;
  const bottom = 1 - monitor.spec.offsetBottomIn / maxHeightIn;

  return {
    left: runningInchX / totalWidthIn,
    right: (runningInchX + monitor.widthIn) / totalWidthIn,
    top: bottom - monitor.heightIn / maxHeightIn,
    bottom,
  };
}

/**
 * Sample regions for every monitor, left to right.
 * Each gap advances the running offset, so the source slice it covers is skipped.
 */
export function computeSampleRegions(layout: Layout): NormalizedRect[] {
  const regions: NormalizedRect[] = [];
  let runningInchX = 0;

  layout.monitors.forEach((monitor, i) => {
    regions.push(computeMonitorSampleRegion(monitor, layout, runningInchX));
    runningInchX += monitor.widthIn;
    if (i < layout.gapsIn.length) {
      runningInchX += layout.gapsIn[i];
    }
  });

  return regions;
}

/**
 * Converts a normalized region to a pixel box in an image of the given size.
 * Each edge is rounded independently, then clamped to the image, keeping at
 * least one pixel in each axis.
 */
export function toPixelRect(region: NormalizedRect, size: Size): PixelRect {
  const left = clamp(Math.round(region.left * size.width), 0, size.width - 1);
  const top = clamp(Math.round(region.top * size.height), 0, size.height - 1);
  const right = clamp(Math.round(region.right * size.width), left + 1, size.width);
  const bottom = clamp(Math.round(region.bottom * size.height), top + 1, size.height);

  return {
    x: left,
    y: top,
    width: right - left,
    height: bottom - top,
  };
}

// ============================================================================
// Helper Functions
// ============================================================================

function assertNonDegenerate(layout: Pick<Layout, 'totalWidthIn' | 'maxHeightIn'>): void {
  if (!(layout.totalWidthIn > 0) || !(layout.maxHeightIn > 0)) {
    throw new ConfigError(
      `degenerate layout: ${layout.totalWidthIn} x ${layout.maxHeightIn} inches`
    );
  }
}

function sum(values: ReadonlyArray<number>): number {
  return values.reduce((total, value) => total + value, 0);
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
