class AppError extends Error {
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
 * Raised when environment settings fail validation.
 */
class ConfigError extends AppError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
  }
}

/**
 * Raised when a chat completion request fails or returns an unusable body.
 */
class CompletionError extends AppError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    cause?: Error,
  ) {
    super(message, cause);
  }
}

/**
 * Normalizes an unknown thrown value for use as an error cause.
 */
function toError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

export { AppError, CompletionError, ConfigError, toError };
