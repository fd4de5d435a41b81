/**
 * Base error class for chunking-related errors
 */
export class ChunkerError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    if (cause?.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Thrown before chunking starts when a size limit is not a positive integer.
 */
export class InvalidChunkLimitError extends ChunkerError {
  constructor(
    public readonly limitName: "softLimit" | "hardLimit",
    public readonly value: number,
  ) {
    super(`${limitName} must be a positive integer, got ${value}`);
  }
}

/**
 * Thrown when chunk files cannot be written to the output directory.
 */
export class ChunkWriteError extends ChunkerError {
  constructor(
    public readonly outputDir: string,
    cause?: Error,
  ) {
    super(`Failed to write chunks to ${outputDir}`, cause);
  }
}
