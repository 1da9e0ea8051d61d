// Monitor layout configuration loading
// The layout is plain JSON: monitors left to right plus the gaps between them.

import { readFileSync } from 'fs';
import path from 'path';
import { ConfigError, describeError } from '../errors';
import type { LayoutConfig, MonitorSpec } from '../layout/types';

// ============================================================================
// Constants
// ============================================================================

/**
 * Environment variable naming an alternative layout file.
 */
export const CONFIG_ENV_VAR = 'SPAN_WALLPAPER_CONFIG';

/**
 * Layout bundled with the package.
 */
export const DEFAULT_CONFIG_PATH = path.resolve(__dirname, '../../config/monitors.json');

const MONITOR_FIELDS = [
  'widthPx',
  'heightPx',
  'scaling',
  'diagonalIn',
  'aspectW',
  'aspectH',
] as const satisfies ReadonlyArray<keyof MonitorSpec>;

// ============================================================================
// Parsing
// ============================================================================

/**
 * Validates the shape of a layout config read from JSON.
 * Value ranges are checked later by computeLayout.
 *
 * @param raw - Parsed JSON value
 * @param source - Where the value came from, for error messages
 */
export function parseLayoutConfig(raw: unknown, source = 'layout config'): LayoutConfig {
  if (!isRecord(raw)) {
    throw new ConfigError(`${source}: expected an object`);
  }

  const { monitors, gapsIn } = raw;
  if (!Array.isArray(monitors)) {
    throw new ConfigError(`${source}: "monitors" must be an array`);
  }
  if (!Array.isArray(gapsIn)) {
    throw new ConfigError(`${source}: "gapsIn" must be an array`);
  }

  return {
    monitors: monitors.map((entry, i) => parseMonitor(entry, `${source}: monitors[${i}]`)),
    gapsIn: gapsIn.map((gap, i) => requireNumber(gap, `${source}: gapsIn[${i}]`)),
  };
}

function parseMonitor(raw: unknown, label: string): MonitorSpec {
  if (!isRecord(raw)) {
    throw new ConfigError(`${label}: expected an object`);
  }

  const [widthPx, heightPx, scaling, diagonalIn, aspectW, aspectH] = MONITOR_FIELDS.map(
    (field) => requireNumber(raw[field], `${label}.${field}`)
  );
  // Optional: monitors on the baseline may omit it
  const offsetBottomIn =
    raw.offsetBottomIn === undefined
      ? 0
      : requireNumber(raw.offsetBottomIn, `${label}.offsetBottomIn`);

  return Object.freeze({
    widthPx,
    heightPx,
    scaling,
    diagonalIn,
    aspectW,
    aspectH,
    offsetBottomIn,
  });
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Reads and parses a layout file.
 */
export function loadLayoutConfig(filePath: string): LayoutConfig {
  let text: string;
  try {
    text = readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new ConfigError(`cannot read layout config ${filePath}: ${describeError(error)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`invalid JSON in ${filePath}: ${describeError(error)}`);
  }

  return parseLayoutConfig(raw, filePath);
}

/**
 * Layout file to use: the environment override if set, else the bundled default.
 */
export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env[CONFIG_ENV_VAR];
  return override && override.trim() !== '' ? path.resolve(override) : DEFAULT_CONFIG_PATH;
}

// ============================================================================
// Helper Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireNumber(value: unknown, label: string): number {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new ConfigError(`${label} must be a number`);
  }
  return value;
}
