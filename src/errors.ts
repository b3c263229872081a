/**
 * Error taxonomy
 * Per-item failures never escape the worker; the others stop a run before it starts
 */

export class DocbatchError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Input directory missing or not a directory
export class DiscoveryError extends DocbatchError {
  constructor(
    readonly inputDir: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

// Invalid configuration, unknown backend or missing credential
export class ConfigurationError extends DocbatchError {}

// Converter or artifact write failed for one item
export class ItemConversionError extends DocbatchError {}

// Internal defect in the image path encoder
export class EncodingError extends DocbatchError {}

/**
 * Extract a one-line description from anything thrown
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}
