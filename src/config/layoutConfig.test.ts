// Tests for layout config parsing and loading

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import {
  CONFIG_ENV_VAR,
  DEFAULT_CONFIG_PATH,
  loadLayoutConfig,
  parseLayoutConfig,
  resolveConfigPath,
} from './layoutConfig';
import { ConfigError } from '../errors';

const MONITOR = {
  widthPx: 2560,
  heightPx: 1440,
  scaling: 1.25,
  diagonalIn: 27,
  aspectW: 16,
  aspectH: 9,
  offsetBottomIn: 0.75,
};

let workDir: string;

beforeAll(() => {
  workDir = mkdtempSync(path.join(tmpdir(), 'span-wallpaper-config-'));
});

afterAll(() => {
  rmSync(workDir, { recursive: true, force: true });
});

describe('parseLayoutConfig', () => {
  it('accepts a well-formed config', () => {
    const config = parseLayoutConfig({ monitors: [MONITOR, MONITOR], gapsIn: [0.5] });

    expect(config.monitors).toEqual([MONITOR, MONITOR]);
    expect(config.gapsIn).toEqual([0.5]);
  });

  it('defaults a missing bottom offset to zero', () => {
    const { offsetBottomIn: _omitted, ...withoutOffset } = MONITOR;

    const config = parseLayoutConfig({ monitors: [withoutOffset], gapsIn: [] });

    expect(config.monitors[0].offsetBottomIn).toBe(0);
  });

  it('rejects a non-object root', () => {
    expect(() => parseLayoutConfig([])).toThrow(new ConfigError('layout config: expected an object'));
  });

  it('rejects a missing monitors array', () => {
    expect(() => parseLayoutConfig({ gapsIn: [] })).toThrow('layout config: "monitors" must be an array');
  });

  it('rejects a missing gaps array', () => {
    expect(() => parseLayoutConfig({ monitors: [] })).toThrow('layout config: "gapsIn" must be an array');
  });

  it('names the offending monitor field', () => {
    expect(() =>
      parseLayoutConfig({ monitors: [{ ...MONITOR, scaling: '125%' }], gapsIn: [] })
    ).toThrow('layout config: monitors[0].scaling must be a number');
  });

  it('names the offending gap', () => {
    expect(() => parseLayoutConfig({ monitors: [MONITOR, MONITOR], gapsIn: [null] })).toThrow(
      'layout config: gapsIn[0] must be a number'
    );
  });
});

describe('loadLayoutConfig', () => {
  it('loads the bundled three-monitor layout', () => {
    const config = loadLayoutConfig(DEFAULT_CONFIG_PATH);

    expect(config.monitors).toHaveLength(3);
    expect(config.monitors.map((m) => m.diagonalIn)).toEqual([15.6, 32, 27]);
    expect(config.gapsIn).toEqual([0.4, 0.5]);
  });

  it('reads a file written by the user', () => {
    const file = path.join(workDir, 'single.json');
    writeFileSync(file, JSON.stringify({ monitors: [MONITOR], gapsIn: [] }));

    expect(loadLayoutConfig(file).monitors).toEqual([MONITOR]);
  });

  it('fails with ConfigError on invalid JSON', () => {
    const file = path.join(workDir, 'broken.json');
    writeFileSync(file, '{ "monitors": [');

    expect(() => loadLayoutConfig(file)).toThrow(ConfigError);
  });

  it('fails with ConfigError when the file is missing', () => {
    const file = path.join(workDir, 'nope.json');

    expect(() => loadLayoutConfig(file)).toThrow(/^cannot read layout config /);
  });
});

describe('resolveConfigPath', () => {
  it('falls back to the bundled layout', () => {
    expect(resolveConfigPath({})).toBe(DEFAULT_CONFIG_PATH);
  });

  it('ignores a blank override', () => {
    expect(resolveConfigPath({ [CONFIG_ENV_VAR]: '  ' })).toBe(DEFAULT_CONFIG_PATH);
  });

  it('resolves the override against the working directory', () => {
    expect(resolveConfigPath({ [CONFIG_ENV_VAR]: 'desk.json' })).toBe(path.resolve('desk.json'));
  });
});
