import { AppError } from "../utils/errors";

/**
 * Raised when a source document cannot be turned into markdown.
 */
export class ConversionError extends AppError {
  constructor(
    message: string,
    public readonly sourcePath?: string,
    cause?: Error,
  ) {
    super(message, cause);
  }
}
