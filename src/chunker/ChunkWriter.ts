import fs from "node:fs/promises";
import path from "node:path";
import { logger } from "../utils/logger";
import { ChunkWriteError } from "./errors";
import type { MarkdownChunk } from "./types";

export const CHUNK_LOG_FILE = "chunks.log";

/**
 * File name of the n-th chunk (1-based).
 */
export function chunkFileName(chunkNumber: number): string {
  return `chunk_${chunkNumber}.md`;
}

/**
 * One line per chunk: file name, token count and the boundary reason.
 */
export function formatChunkLog(chunks: MarkdownChunk[]): string {
  return chunks
    .map(
      (chunk, i) => `${chunkFileName(i + 1)}\t${chunk.tokenCount} tokens\t${chunk.reason}`,
    )
    .join("\n");
}

/**
 * Writes every chunk to its own markdown file plus a summary log.
 * @returns Paths of the written chunk files, in chunk order.
 */
export async function saveChunks(
  chunks: MarkdownChunk[],
  outputDir: string,
): Promise<string[]> {
  try {
    await fs.mkdir(outputDir, { recursive: true });

    const filePaths: string[] = [];
    for (const [i, chunk] of chunks.entries()) {
      const filePath = path.join(outputDir, chunkFileName(i + 1));
      await fs.writeFile(filePath, chunk.content, "utf-8");
      filePaths.push(filePath);
    }
    await fs.writeFile(
      path.join(outputDir, CHUNK_LOG_FILE),
      `${formatChunkLog(chunks)}\n`,
      "utf-8",
    );

    logger.info(`💾 Saved ${chunks.length} chunks to ${outputDir}`);
    return filePaths;
  } catch (error) {
    throw new ChunkWriteError(outputDir, error instanceof Error ? error : undefined);
  }
}
