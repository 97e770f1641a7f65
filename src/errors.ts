/**
 * Errors raised by a conversion run.
 *
 * Problems inside crate data never surface here; they are skipped while
 * decoding. These errors cover paths and I/O.
 *
 * @module errors
 */

/**
 * Base class for errors raised by crate-bridge.
 */
export class CrateBridgeError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The crate root does not exist or is not a directory.
 */
export class CrateRootNotFoundError extends CrateBridgeError {
  constructor(readonly crateRoot: string) {
    super(`Crate folder not found at: ${crateRoot}`);
  }
}

/**
 * The XML output could not be written.
 */
export class OutputWriteError extends CrateBridgeError {
  constructor(readonly output: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to write ${output}: ${reason}`, { cause });
  }
}

/**
 * A configuration file could not be loaded.
 */
export class ConfigError extends CrateBridgeError {
  constructor(readonly configPath: string, reason: string, cause?: unknown) {
    super(`Invalid config ${configPath}: ${reason}`, { cause });
  }
}
