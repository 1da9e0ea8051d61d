// Error types for layout configuration and image I/O

/**
 * Invalid monitor/gap configuration or a degenerate layout.
 * Always raised before any image is read.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Failure reading, decoding, processing or writing an image.
 * The underlying library error is kept as `cause`.
 */
export class ImageIOError extends Error {
  readonly path: string | null;

  constructor(message: string, path: string | null, cause?: unknown) {
    super(message, { cause });
    this.name = 'ImageIOError';
    this.path = path;
  }
}

/**
 * Extracts a printable message from an unknown thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
