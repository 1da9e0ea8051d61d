// Unit and property tests for per-monitor geometry

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { ConfigError } from '../errors';
import { computeMonitorGeometry, physicalSize, scaledPixels } from './monitor';
import type { MonitorSpec } from './types';

const FHD_24: MonitorSpec = {
  widthPx: 1920,
  heightPx: 1080,
  scaling: 1,
  diagonalIn: 24,
  aspectW: 16,
  aspectH: 9,
  offsetBottomIn: 0,
};

describe('physicalSize', () => {
  it('splits a 5in 4:3 diagonal into 4in x 3in', () => {
    const { widthIn, heightIn } = physicalSize({ diagonalIn: 5, aspectW: 4, aspectH: 3 });

    expect(widthIn).toBe(4);
    expect(heightIn).toBe(3);
  });

  it('gives a 27in 16:9 panel about 23.53in x 13.24in', () => {
    const { widthIn, heightIn } = physicalSize({ diagonalIn: 27, aspectW: 16, aspectH: 9 });

    expect(widthIn).toBeCloseTo(23.533, 3);
    expect(heightIn).toBeCloseTo(13.237, 3);
  });
});

describe('scaledPixels', () => {
  it('divides native resolution by the scaling factor', () => {
    expect(scaledPixels({ widthPx: 2560, heightPx: 1440, scaling: 1.25 })).toEqual({
      widthScaledPx: 2048,
      heightScaledPx: 1152,
    });
  });

  it('rounds each axis independently', () => {
    // 1366 / 1.5 = 910.67, 768 / 1.5 = 512
    expect(scaledPixels({ widthPx: 1366, heightPx: 768, scaling: 1.5 })).toEqual({
      widthScaledPx: 911,
      heightScaledPx: 512,
    });
  });
});

describe('computeMonitorGeometry', () => {
  it('keeps a reference to the input spec', () => {
    const geometry = computeMonitorGeometry(FHD_24);

    expect(geometry.spec).toBe(FHD_24);
    expect(geometry.widthScaledPx).toBe(1920);
    expect(geometry.heightScaledPx).toBe(1080);
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(computeMonitorGeometry(FHD_24))).toBe(true);
  });

  it('rejects a zero pixel width', () => {
    expect(() => computeMonitorGeometry({ ...FHD_24, widthPx: 0 }, 2)).toThrow(
      new ConfigError('monitor 2: widthPx must be a positive integer, got 0')
    );
  });

  it('rejects a negative scaling factor', () => {
    expect(() => computeMonitorGeometry({ ...FHD_24, scaling: -1 })).toThrow(
      'monitor 0: scaling must be a positive number, got -1'
    );
  });

  it('rejects a zero diagonal', () => {
    expect(() => computeMonitorGeometry({ ...FHD_24, diagonalIn: 0 })).toThrow(ConfigError);
  });

  it('rejects fractional aspect components', () => {
    expect(() => computeMonitorGeometry({ ...FHD_24, aspectH: 9.5 })).toThrow(
      'monitor 0: aspectH must be a positive integer, got 9.5'
    );
  });

  it('rejects a negative bottom offset', () => {
    expect(() => computeMonitorGeometry({ ...FHD_24, offsetBottomIn: -0.5 })).toThrow(
      'monitor 0: offsetBottomIn must be a non-negative number, got -0.5'
    );
  });

  it('rejects a scaling factor that leaves no logical pixels', () => {
    expect(() => computeMonitorGeometry({ ...FHD_24, scaling: 5000 })).toThrow(ConfigError);
  });
});

// ============================================================================
// Property-Based Tests
// ============================================================================

describe('Property: physical size matches diagonal and aspect', () => {
  const diagonal = fc.double({ min: 1, max: 100, noNaN: true });
  const aspect = fc.integer({ min: 1, max: 32 });

  it('width² + height² equals diagonal²', () => {
    fc.assert(
      fc.property(diagonal, aspect, aspect, (diagonalIn, aspectW, aspectH) => {
        const { widthIn, heightIn } = physicalSize({ diagonalIn, aspectW, aspectH });

        expect(widthIn ** 2 + heightIn ** 2).toBeCloseTo(diagonalIn ** 2, 6);
      }),
      { numRuns: 100 }
    );
  });

  it('width / height equals aspectW / aspectH', () => {
    fc.assert(
      fc.property(diagonal, aspect, aspect, (diagonalIn, aspectW, aspectH) => {
        const { widthIn, heightIn } = physicalSize({ diagonalIn, aspectW, aspectH });

        expect(widthIn / heightIn).toBeCloseTo(aspectW / aspectH, 9);
      }),
      { numRuns: 100 }
    );
  });
});
