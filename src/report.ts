// Console report lines for a composite run

import type { Layout, Size } from './layout/types';

function dimensionLines(heading: string, width: string | number, height: string | number): string[] {
  return [heading, `  width:  ${width}`, `  height: ${height}`, ''];
}

/**
 * Physical and output pixel dimensions of a layout.
 */
export function formatLayoutSummary(layout: Layout): string[] {
  return [
    ...dimensionLines(
      'Setup dimensions in inches:',
      layout.totalWidthIn.toFixed(2),
      layout.maxHeightIn.toFixed(2)
    ),
    ...dimensionLines(
      'Output image dimensions (your input image should be at least this size to avoid blur):',
      layout.totalOutputWidthPx,
      layout.outputHeightPx
    ),
  ];
}

/**
 * Per-monitor breakdown, one line per monitor.
 */
export function formatMonitorTable(layout: Layout): string[] {
  return layout.monitors.map((m, i) => {
    const physical = `${m.widthIn.toFixed(2)}x${m.heightIn.toFixed(2)}in`;
    const pixels = `${m.widthScaledPx}x${m.heightScaledPx}px`;
    return `  #${i + 1}: ${physical} -> ${pixels}, raised ${m.spec.offsetBottomIn}in`;
  });
}

/**
 * Decoded input image dimensions.
 */
export function formatInputSummary(size: Size): string[] {
  return dimensionLines('Input image dimensions:', size.width, size.height);
}
