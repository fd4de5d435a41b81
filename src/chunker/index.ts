export { ChunkerError, ChunkWriteError, InvalidChunkLimitError } from "./errors";
export { CHUNK_LOG_FILE, chunkFileName, formatChunkLog, saveChunks } from "./ChunkWriter";
export { MarkdownChunker, assertChunkLimits, chunkMarkdown } from "./MarkdownChunker";
export {
  countWords,
  getHeadingLevel,
  isHeading,
  isListItem,
  isPageBreak,
  isTable,
  splitIntoParagraphs,
} from "./paragraphs";
export type { ChunkerOptions, MarkdownChunk, TokenCounter } from "./types";
