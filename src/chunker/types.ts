/**
 * Approximate size measure for a piece of text. Must be a pure function of its
 * input and must not decrease when text is appended.
 */
export type TokenCounter = (text: string) => number;

/**
 * Size thresholds for chunking, expressed in the unit of the token counter.
 */
export interface ChunkerOptions {
  /** Accepted for compatibility; no chunking decision currently uses it */
  softLimit: number;
  /** A chunk must not exceed this size, except for the documented exceptions */
  hardLimit: number;
  /** Defaults to whitespace-delimited word count */
  countTokens?: TokenCounter;
}

/**
 * Output unit of the chunker: one or more paragraphs joined by a blank line.
 */
export interface MarkdownChunk {
  content: string;
  paragraphs: string[];
  /** Why the boundary was placed here, for diagnostics */
  reason: string;
  tokenCount: number;
}
