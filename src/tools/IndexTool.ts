import type { IndexingService, IndexResult } from "../store";
import { toError } from "../utils/errors";
import { logger } from "../utils/logger";
import { ToolError } from "./errors";

export interface IndexToolArgs {
  sourcePath: string;
  outputDir?: string;
  reindex?: boolean;
}

export interface IndexToolResult extends IndexResult {
  message: string;
}

/**
 * Ingests one document: convert, chunk, embed and store.
 */
export class IndexTool {
  readonly name = "index";

  constructor(private readonly indexer: Pick<IndexingService, "indexFile">) {}

  async execute(args: IndexToolArgs): Promise<IndexToolResult> {
    const { sourcePath, outputDir, reindex = false } = args;
    logger.info(`📥 Indexing ${sourcePath}${reindex ? " (reindex)" : ""}`);

    try {
      const result = await this.indexer.indexFile(sourcePath, { outputDir, reindex });
      const message = result.skipped
        ? `${result.docName} is already indexed as ${result.docId}; use reindex to replace it.`
        : `Indexed ${result.chunkCount} chunks of ${result.docName} as ${result.docId}.`;
      return { ...result, message };
    } catch (error) {
      const cause = toError(error);
      throw new ToolError(
        `Failed to index ${sourcePath}: ${cause?.message ?? String(error)}`,
        this.name,
        cause,
      );
    }
  }
}
