import { AppError } from "../utils/errors";

/**
 * Raised by a tool's execute method, naming the tool that failed.
 */
class ToolError extends AppError {
  constructor(
    message: string,
    public readonly toolName: string,
    cause?: Error,
  ) {
    super(message, cause);
  }
}

/**
 * Formats a zod failure as one line per offending field.
 */
function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

export { ToolError, formatIssues };
