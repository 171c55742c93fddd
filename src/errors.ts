// --- Error Types ---
//
// The conversion core never throws; these cover the I/O around it.

/** Base error class for failures outside the conversion core. */
export class OutlinePorterError extends Error {
  constructor(
    public readonly path: string,
    message: string,
  ) {
    super(message);
    this.name = 'OutlinePorterError';
  }
}

/** Error thrown when the input file cannot be read. */
export class InputReadError extends OutlinePorterError {
  constructor(path: string, reason: string) {
    super(path, `Cannot read input "${path}": ${reason}`);
    this.name = 'InputReadError';
  }
}

/** Error thrown when a config file is unreadable or is not valid JSON. */
export class ConfigFileError extends OutlinePorterError {
  constructor(path: string, reason: string) {
    super(path, `Cannot load config "${path}": ${reason}`);
    this.name = 'ConfigFileError';
  }
}

/** Error thrown when the converted text cannot be written. */
export class OutputWriteError extends OutlinePorterError {
  constructor(path: string, reason: string) {
    super(path, `Cannot write output "${path}": ${reason}`);
    this.name = 'OutputWriteError';
  }
}

/**
 * Extract a readable reason from an unknown thrown value.
 */
export function errorReason(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
