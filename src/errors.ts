/**
 * Error taxonomy for a sync run.
 */

/**
 * The Dropbox client could not be set up (missing or rejected token).
 * Raised before any reconciliation takes place.
 */
export class InitializationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InitializationError";
  }
}

/**
 * A listing page request failed. The partial listing is discarded.
 */
export class ListingError extends Error {
  constructor(
    message: string,
    public readonly remotePath: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ListingError";
  }
}

export type TransferDirection = "upload" | "download";

/**
 * An upload or download of a single path failed. State for that path is
 * left as it was.
 */
export class TransferError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly direction: TransferDirection,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TransferError";
  }
}

/**
 * A deletion failed for a reason other than the target being absent.
 */
export class DeleteError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly side: "local" | "remote",
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "DeleteError";
  }
}

/**
 * The configuration file or a configuration value is invalid.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/**
 * Formats an unknown thrown value for log output.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Narrows a caught value to a Node.js system error.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
