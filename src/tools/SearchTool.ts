import { z } from "zod";
import type { IndexingService, SearchResult } from "../store";
import { toError } from "../utils/errors";
import { logger } from "../utils/logger";
import { ToolError, formatIssues } from "./errors";

const searchArgsSchema = z.object({
  query: z.string().trim().min(1, "Query must not be empty"),
  limit: z.number().int().positive().default(5),
});

export type SearchToolOptions = z.input<typeof searchArgsSchema>;

export interface SearchToolResult {
  results: SearchResult[];
}

/**
 * Hybrid (vector and keyword) search over all indexed chunks.
 */
export class SearchTool {
  readonly name = "search";

  constructor(private readonly indexer: Pick<IndexingService, "search">) {}

  async execute(options: SearchToolOptions): Promise<SearchToolResult> {
    const parsed = searchArgsSchema.safeParse(options);
    if (!parsed.success) {
      throw new ToolError(`Invalid arguments: ${formatIssues(parsed.error.issues)}`, this.name);
    }
    const { query, limit } = parsed.data;

    logger.info(`🔍 Searching for: ${query}`);

    try {
      const results = await this.indexer.search(query, limit);
      logger.info(`✅ Found ${results.length} matching chunks`);
      return { results };
    } catch (error) {
      const cause = toError(error);
      throw new ToolError(
        `Failed to search for "${query}": ${cause?.message ?? String(error)}`,
        this.name,
        cause,
      );
    }
  }
}
