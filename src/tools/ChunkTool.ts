import fs from "node:fs/promises";
import { z } from "zod";
import { MarkdownChunker, saveChunks } from "../chunker";
import type { ChunkLimits } from "../config";
import { toError } from "../utils/errors";
import { logger } from "../utils/logger";
import { ToolError, formatIssues } from "./errors";

const chunkArgsSchema = z.object({
  inputPath: z.string().min(1),
  outputDir: z.string().min(1),
  softLimit: z.number().int().positive().optional(),
  hardLimit: z.number().int().positive().optional(),
});

export type ChunkToolArgs = z.input<typeof chunkArgsSchema>;

export interface ChunkToolResult {
  chunkCount: number;
  files: string[];
  outputDir: string;
}

/**
 * Splits a markdown file into chunk files plus a chunks.log summary.
 */
export class ChunkTool {
  readonly name = "chunk";

  constructor(private readonly defaults: ChunkLimits) {}

  async execute(args: ChunkToolArgs): Promise<ChunkToolResult> {
    const parsed = chunkArgsSchema.safeParse(args);
    if (!parsed.success) {
      throw new ToolError(`Invalid arguments: ${formatIssues(parsed.error.issues)}`, this.name);
    }
    const { inputPath, outputDir } = parsed.data;
    const softLimit = parsed.data.softLimit ?? this.defaults.softLimit;
    const hardLimit = parsed.data.hardLimit ?? this.defaults.hardLimit;

    logger.info(`✂️ Chunking ${inputPath} (soft ${softLimit}, hard ${hardLimit})`);

    try {
      const markdown = await fs.readFile(inputPath, "utf-8");
      const chunks = new MarkdownChunker({ softLimit, hardLimit }).chunk(markdown);
      const files = await saveChunks(chunks, outputDir);
      return { chunkCount: chunks.length, files, outputDir };
    } catch (error) {
      const cause = toError(error);
      throw new ToolError(
        `Failed to chunk ${inputPath}: ${cause?.message ?? String(error)}`,
        this.name,
        cause,
      );
    }
  }
}
