import type { ConversionMethod, MarkdownConverter } from "../converter";
import { toError } from "../utils/errors";
import { logger } from "../utils/logger";
import { ToolError } from "./errors";

export interface ConvertToolArgs {
  sourcePath: string;
  targetDir: string;
}

export interface ConvertToolResult {
  markdownPath: string;
  method: ConversionMethod;
  characters: number;
}

/**
 * Converts one source document to `<targetDir>/<basename>.md`.
 */
export class ConvertTool {
  readonly name = "convert";

  constructor(private readonly converter: Pick<MarkdownConverter, "convertToFile">) {}

  async execute(args: ConvertToolArgs): Promise<ConvertToolResult> {
    const { sourcePath, targetDir } = args;
    logger.info(`🔄 Converting ${sourcePath}`);

    try {
      const result = await this.converter.convertToFile(sourcePath, targetDir);
      return {
        markdownPath: result.markdownPath,
        method: result.method,
        characters: result.markdown.length,
      };
    } catch (error) {
      const cause = toError(error);
      throw new ToolError(
        `Failed to convert ${sourcePath}: ${cause?.message ?? String(error)}`,
        this.name,
        cause,
      );
    }
  }
}
