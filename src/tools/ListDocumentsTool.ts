import type { DocumentSummary, IndexingService } from "../store";
import { toError } from "../utils/errors";
import { ToolError } from "./errors";

/**
 * Lists indexed documents with their chunk counts.
 */
export class ListDocumentsTool {
  readonly name = "list";

  constructor(private readonly indexer: Pick<IndexingService, "listDocuments">) {}

  async execute(): Promise<{ documents: DocumentSummary[] }> {
    try {
      return { documents: await this.indexer.listDocuments() };
    } catch (error) {
      const cause = toError(error);
      throw new ToolError(
        `Failed to list documents: ${cause?.message ?? String(error)}`,
        this.name,
        cause,
      );
    }
  }
}
