import type { IndexingService } from "../store";
import { DocumentNotFoundError } from "../store/errors";
import { toError } from "../utils/errors";
import { logger } from "../utils/logger";
import { ToolError } from "./errors";

export interface RemoveToolArgs {
  docId?: string;
  docName?: string;
}

/**
 * Removes every chunk of one indexed document, addressed by id or by name.
 */
export class RemoveTool {
  readonly name = "remove";

  constructor(private readonly indexer: Pick<IndexingService, "removeDocument">) {}

  async execute(args: RemoveToolArgs): Promise<{ message: string; removed: number }> {
    const { docId, docName } = args;
    const target = docId ?? docName ?? "";

    logger.info(`Executing ${this.name} for ${target}`);

    try {
      const removed = await this.indexer.removeDocument({ docId, docName });
      if (removed === 0) {
        throw new DocumentNotFoundError(target);
      }
      const message = `Successfully removed ${removed} chunks of ${target}.`;
      logger.info(message);
      return { message, removed };
    } catch (error) {
      const cause = toError(error);
      const errorMessage = `Failed to remove ${target}: ${cause?.message ?? String(error)}`;
      logger.error(`Error executing ${this.name}: ${errorMessage}`);
      throw new ToolError(errorMessage, this.name, cause);
    }
  }
}
