/**
 * Error classes raised while decoding or accessing a disc image.
 */

/**
 * Base class for every error raised by this library.
 */
export class DiscImageError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'DiscImageError';
  }
}

/** Truncated or structurally invalid fixed-layout data. */
export class FormatError extends DiscImageError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'FormatError';
  }
}

/** An offset lies outside a declared region. */
export class OutOfRangeError extends DiscImageError {
  constructor(message: string) {
    super(message);
    this.name = 'OutOfRangeError';
  }
}

/** An extent crosses the end of a declared region. Regions never grow or shrink. */
export class RangeExceededError extends DiscImageError {
  constructor(message: string) {
    super(message);
    this.name = 'RangeExceededError';
  }
}

export class InvalidArgumentError extends DiscImageError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/** No registry entry matches the requested path. */
export class NotFoundError extends DiscImageError {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}
