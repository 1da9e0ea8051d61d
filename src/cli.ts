#!/usr/bin/env node
/**
 * span-wallpaper CLI
 *
 * Renders one image as a spanned wallpaper across a row of monitors.
 *
 * Usage:
 *   span-wallpaper run <input_image> <output_image>
 *   span-wallpaper info
 *
 * The monitor layout is read from $SPAN_WALLPAPER_CONFIG, or the bundled
 * config/monitors.json when unset.
 */

import { loadLayoutConfig, resolveConfigPath } from './config/layoutConfig';
import { ConfigError, ImageIOError, describeError } from './errors';
import { describeCropMode } from './export/aspectRatio';
import { createCompositor } from './export/compositor';
import type { ImageBackend } from './export/imageBackend';
import { sharpBackend } from './export/sharpBackend';
import { computeLayoutFromConfig } from './layout/layoutEngine';
import type { Layout } from './layout/types';
import { formatInputSummary, formatLayoutSummary, formatMonitorTable } from './report';

export const USAGE = [
  'Usage:',
  '  span-wallpaper run <input_image> <output_image>',
  '  span-wallpaper info',
].join('\n');

/**
 * Dependencies the CLI talks to; tests swap them out.
 */
export interface CliContext {
  env: NodeJS.ProcessEnv;
  backend: ImageBackend;
  log: (line: string) => void;
  error: (line: string) => void;
}

const defaultContext: CliContext = {
  env: process.env,
  backend: sharpBackend,
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

// ============================================================================
// Commands
// ============================================================================

function loadLayout(ctx: CliContext): Layout {
  const configPath = resolveConfigPath(ctx.env);
  return computeLayoutFromConfig(loadLayoutConfig(configPath));
}

function info(ctx: CliContext): void {
  const layout = loadLayout(ctx);
  formatLayoutSummary(layout).forEach(ctx.log);
  ctx.log('Monitors (left to right):');
  formatMonitorTable(layout).forEach(ctx.log);
}

async function run(ctx: CliContext, inputPath: string, outputPath: string): Promise<void> {
  // Layout errors surface before any image is touched
  const layout = loadLayout(ctx);
  formatLayoutSummary(layout).forEach(ctx.log);

  const compositor = createCompositor(layout, ctx.backend);
  const result = await compositor.composeFile(inputPath, outputPath, 'png');

  formatInputSummary(result.sourceSize).forEach(ctx.log);
  ctx.log(describeCropMode(result.crop.mode));
  ctx.log(`Saved ready-to-use wallpaper to: ${outputPath}`);
}

// ============================================================================
// Entry point
// ============================================================================

/**
 * Runs the CLI and returns the process exit code.
 *
 * @param argv - Arguments after the executable and script name
 */
export async function main(argv: string[], ctx: CliContext = defaultContext): Promise<number> {
  const [command, ...args] = argv;

  try {
    if (command === 'run' && args.length === 2) {
      await run(ctx, args[0], args[1]);
      return 0;
    }
    if (command === 'info' && args.length === 0) {
      info(ctx);
      return 0;
    }
  } catch (error) {
    if (error instanceof ConfigError) {
      ctx.error(`Error: ${error.message}`);
      return 1;
    }
    if (error instanceof ImageIOError) {
      ctx.error(`Image error: ${error.message}`);
      return 1;
    }
    throw error;
  }

  ctx.error(USAGE);
  return 1;
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(`Unexpected failure: ${describeError(error)}`);
      process.exitCode = 1;
    });
}
