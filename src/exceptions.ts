/**
 * Error classes for the vector database client.
 *
 * These are internal signals: public operations log them and convert them to
 * `false` or an empty result. Only {@link ConfigurationError} is thrown to callers.
 */

/**
 * Base class for all client errors
 */
export class VectorDBError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'VectorDBError';
    Object.setPrototypeOf(this, VectorDBError.prototype);
  }
}

/**
 * Raised when the request could not be exchanged with the server
 * (DNS failure, refused connection, timeout, malformed URL, aborted body)
 */
export class TransportError extends VectorDBError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TransportError';
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

/**
 * Raised when a response accumulator cannot grow to hold the next chunk
 */
export class AllocationError extends VectorDBError {
  constructor(
    message: string,
    public readonly requestedBytes: number
  ) {
    super(message);
    this.name = 'AllocationError';
    Object.setPrototypeOf(this, AllocationError.prototype);
  }
}

/**
 * Raised when a response body is not valid JSON
 */
export class DecodeError extends VectorDBError {
  constructor(
    message: string,
    public readonly position?: number
  ) {
    super(message);
    this.name = 'DecodeError';
    Object.setPrototypeOf(this, DecodeError.prototype);
  }
}

/**
 * Raised from the client constructor for unusable configuration
 */
export class ConfigurationError extends VectorDBError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}
