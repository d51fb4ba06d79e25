/**
 * Base class for every error raised by the cache.
 */
export class CacheError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Invalid mode, format or comment, or an entry name that trims to nothing.
 * Raised before any file I/O.
 */
export class ConfigurationError extends CacheError {}

/**
 * The cache directory exists neither as given nor relative to the working directory.
 */
export class DirectoryError extends CacheError {
  constructor(
    readonly dir: string,
    readonly tried: readonly string[],
  ) {
    super(`${dir} is not a valid cache directory (tried: ${tried.join(", ")})`);
  }
}

/**
 * A result could not be encoded as JSON, or a stored entry could not be decoded.
 */
export class SerializationError extends CacheError {
  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}
