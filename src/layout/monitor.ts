// Per-monitor geometry derivation

import { ConfigError } from '../errors';
import type { MonitorGeometry, MonitorSpec } from './types';

// ============================================================================
// Validation
// ============================================================================

/**
 * Checks a MonitorSpec and throws ConfigError on the first invalid field.
 *
 * @param spec - Monitor to validate
 * @param index - Position in the monitor list, used in the error message
 */
export function validateMonitorSpec(spec: MonitorSpec, index: number): void {
  const label = `monitor ${index}`;

  requirePositiveInteger(spec.widthPx, `${label}: widthPx`);
  requirePositiveInteger(spec.heightPx, `${label}: heightPx`);
  requirePositive(spec.scaling, `${label}: scaling`);
  requirePositive(spec.diagonalIn, `${label}: diagonalIn`);
  requirePositiveInteger(spec.aspectW, `${label}: aspectW`);
  requirePositiveInteger(spec.aspectH, `${label}: aspectH`);

  if (!Number.isFinite(spec.offsetBottomIn) || spec.offsetBottomIn < 0) {
    throw new ConfigError(
      `${label}: offsetBottomIn must be a non-negative number, got ${spec.offsetBottomIn}`
    );
  }
}

function requirePositive(value: number, field: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${field} must be a positive number, got ${value}`);
  }
}

function requirePositiveInteger(value: number, field: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${field} must be a positive integer, got ${value}`);
  }
}

// ============================================================================
// Derivation
// ============================================================================

/**
 * Physical width and height from the diagonal and aspect ratio.
 *
 * The diagonal is split along each axis in proportion to the aspect
 * components, so width / height == aspectW / aspectH and
 * width² + height² == diagonal².
 */
export function physicalSize(
  spec: Pick<MonitorSpec, 'diagonalIn' | 'aspectW' | 'aspectH'>
): { widthIn: number; heightIn: number } {
  const aspectDiagonal = Math.sqrt(spec.aspectW ** 2 + spec.aspectH ** 2);
  return {
    widthIn: (spec.diagonalIn * spec.aspectW) / aspectDiagonal,
    heightIn: (spec.diagonalIn * spec.aspectH) / aspectDiagonal,
  };
}

/**
 * Logical pixel footprint after OS scaling. Each axis is rounded on its own.
 * A 2560px panel at 125% scaling occupies 2048 logical pixels.
 */
export function scaledPixels(
  spec: Pick<MonitorSpec, 'widthPx' | 'heightPx' | 'scaling'>
): { widthScaledPx: number; heightScaledPx: number } {
  return {
    widthScaledPx: Math.round(spec.widthPx / spec.scaling),
    heightScaledPx: Math.round(spec.heightPx / spec.scaling),
  };
}

/**
 * Validates a spec and derives its geometry.
 *
 * @param spec - Monitor as configured
 * @param index - Position in the monitor list (for error messages)
 * @returns Immutable derived geometry referencing its MonitorSpec
 */
export function computeMonitorGeometry(spec: MonitorSpec, index = 0): MonitorGeometry {
  validateMonitorSpec(spec, index);

  const { widthIn, heightIn } = physicalSize(spec);
  const { widthScaledPx, heightScaledPx } = scaledPixels(spec);

  // A scaling factor far above the resolution collapses the footprint to zero
  if (widthScaledPx < 1 || heightScaledPx < 1) {
    throw new ConfigError(
      `monitor ${index}: scaling ${spec.scaling} leaves no logical pixels for ${spec.widthPx}x${spec.heightPx}`
    );
  }

  return Object.freeze({
    spec,
    widthIn,
    heightIn,
    widthScaledPx,
    heightScaledPx,
  });
}
