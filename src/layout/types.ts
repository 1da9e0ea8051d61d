// Layout types for monitor geometry
// Physical values are inches, pixel values are integers.

// ============================================================================
// Input Types
// ============================================================================

/**
 * One physical monitor, as configured by the user.
 * Monitors are listed left to right.
 */
export interface MonitorSpec {
  /** Native horizontal resolution in pixels */
  readonly widthPx: number;
  /** Native vertical resolution in pixels */
  readonly heightPx: number;
  /** UI scaling factor set in the display settings (1.25 = 125%) */
  readonly scaling: number;
  /** Physical diagonal in inches */
  readonly diagonalIn: number;
  /** Aspect ratio width component (16 for 16:9) */
  readonly aspectW: number;
  /** Aspect ratio height component (9 for 16:9) */
  readonly aspectH: number;
  /** Height of the monitor's bottom edge above the common baseline, in inches */
  readonly offsetBottomIn: number;
}

/**
 * Monitors plus the physical gaps between neighbours.
 * gapsIn[i] sits between monitors[i] and monitors[i + 1].
 */
export interface LayoutConfig {
  readonly monitors: ReadonlyArray<MonitorSpec>;
  readonly gapsIn: ReadonlyArray<number>;
}

// ============================================================================
// Derived Types
// ============================================================================

/**
 * Geometry derived from a single MonitorSpec.
 */
export interface MonitorGeometry {
  readonly spec: MonitorSpec;
  readonly widthIn: number;
  readonly heightIn: number;
  /** Logical pixel width after DPI scaling */
  readonly widthScaledPx: number;
  /** Logical pixel height after DPI scaling */
  readonly heightScaledPx: number;
}

/**
 * Overall layout of the monitor row.
 */
export interface Layout {
  readonly monitors: ReadonlyArray<MonitorGeometry>;
  readonly gapsIn: ReadonlyArray<number>;
  /** Sum of monitor widths and gaps */
  readonly totalWidthIn: number;
  /** Highest monitor top above the baseline */
  readonly maxHeightIn: number;
  readonly totalOutputWidthPx: number;
  readonly outputHeightPx: number;
}

// ============================================================================
// Region Types
// ============================================================================

/**
 * Rectangle as fractions (0-1) of the overall layout.
 * y runs top to bottom: top = 0 is the top of the layout.
 */
export interface NormalizedRect {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

/**
 * Rectangle in integer pixel coordinates.
 */
export interface PixelRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Point in integer pixel coordinates.
 */
export interface PixelPoint {
  x: number;
  y: number;
}

/**
 * Size in pixels.
 */
export interface Size {
  width: number;
  height: number;
}
