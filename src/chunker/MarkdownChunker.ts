import { logger } from "../utils/logger";
import { InvalidChunkLimitError } from "./errors";
import {
  allPageBreaks,
  countWords,
  getHeadingLevel,
  isHeading,
  isListItem,
  isPageBreak,
  isTable,
  splitIntoParagraphs,
  splitWords,
} from "./paragraphs";
import type { ChunkerOptions, MarkdownChunk, TokenCounter } from "./types";

/** Heading-only groups up to this size wait for the content that follows them */
const MAX_PENDING_GROUP_SIZE = 6;

/** Maximum number of (heading, table) pairs collected into one chunk */
const MAX_TABLE_PAIRS = 2;

/**
 * State of a single chunking call. Created fresh for every call so that
 * concurrent calls never share a cursor or a pending buffer.
 */
interface ChunkingState {
  paragraphs: string[];
  cursor: number;
  chunks: MarkdownChunk[];
  /** Heading-only paragraphs not yet merged into a content chunk */
  pending: string[];
}

/**
 * Validates chunk limits up front so that chunking itself never fails.
 * @throws {InvalidChunkLimitError} If a limit is not a positive integer.
 */
export function assertChunkLimits(softLimit: number, hardLimit: number): void {
  if (!Number.isInteger(softLimit) || softLimit <= 0) {
    throw new InvalidChunkLimitError("softLimit", softLimit);
  }
  if (!Number.isInteger(hardLimit) || hardLimit <= 0) {
    throw new InvalidChunkLimitError("hardLimit", hardLimit);
  }
}

/**
 * Splits markdown into bounded-size chunks for retrieval indexing.
 *
 * Paragraphs are grouped greedily in a single forward pass:
 * - A heading opens a group that also takes deeper subheadings and body text,
 *   and stops at the next heading of the same or a shallower level.
 * - A heading directly followed by a table is grouped with it, up to two
 *   (heading, table) pairs per chunk.
 * - Small heading-only groups are held back and prepended to the next chunk.
 * - A heading longer than the hard limit is cut into word windows.
 * - A page break right before a list item is dropped, and chunks made only of
 *   page breaks are never emitted.
 */
export class MarkdownChunker {
  private readonly softLimit: number;
  private readonly hardLimit: number;
  private readonly countTokens: TokenCounter;

  constructor(options: ChunkerOptions) {
    assertChunkLimits(options.softLimit, options.hardLimit);
    this.softLimit = options.softLimit;
    this.hardLimit = options.hardLimit;
    this.countTokens = options.countTokens ?? countWords;
  }

  chunk(markdown: string): MarkdownChunk[] {
    const state: ChunkingState = {
      paragraphs: splitIntoParagraphs(markdown),
      cursor: 0,
      chunks: [],
      pending: [],
    };
    const { paragraphs } = state;

    while (state.cursor < paragraphs.length) {
      const current = paragraphs[state.cursor];
      const hasNext = state.cursor + 1 < paragraphs.length;

      if (isPageBreak(current) && hasNext && isListItem(paragraphs[state.cursor + 1])) {
        state.cursor++;
        continue;
      }

      if (isHeading(current)) {
        this.processHeading(state);
      } else {
        this.processContent(state);
      }
    }

    this.finalize(state);

    logger.debug(
      `✂️ Split ${paragraphs.length} paragraphs into ${state.chunks.length} chunks (soft ${this.softLimit}, hard ${this.hardLimit})`,
    );
    return state.chunks;
  }

  private processHeading(state: ChunkingState): void {
    const { paragraphs } = state;
    const heading = paragraphs[state.cursor];
    const level = getHeadingLevel(heading);

    if (this.countTokens(heading) > this.hardLimit) {
      this.flushPending(state, "pending headings flushed before oversized heading");
      this.forceSplit(state, heading);
      state.cursor++;
      return;
    }

    if (state.cursor + 1 < paragraphs.length && isTable(paragraphs[state.cursor + 1])) {
      this.collectTableGroups(state);
      return;
    }

    const group = [heading];
    let tokens = this.countTokens(heading);
    state.cursor++;

    while (state.cursor < paragraphs.length) {
      const para = paragraphs[state.cursor];
      if (isHeading(para) && getHeadingLevel(para) <= level) {
        break;
      }
      const paraTokens = this.countTokens(para);
      if (tokens + paraTokens > this.hardLimit) {
        break;
      }
      group.push(para);
      tokens += paraTokens;
      state.cursor++;
    }

    if (this.isDeferrable(group)) {
      state.pending.push(...group);
      return;
    }

    const reason = group.every(isHeading)
      ? `heading-only group under heading level ${level}`
      : `content under heading level ${level}`;
    this.emitWithPending(state, group, reason);
  }

  /**
   * Collects up to two (heading, table) pairs. The first pair is always admitted
   * while the accumulator holds no paragraphs, even if it overflows the hard limit.
   */
  private collectTableGroups(state: ChunkingState): void {
    const { paragraphs } = state;
    const group: string[] = [];
    let tokens = 0;
    let pairs = 0;

    while (
      pairs < MAX_TABLE_PAIRS &&
      state.cursor + 1 < paragraphs.length &&
      isHeading(paragraphs[state.cursor]) &&
      isTable(paragraphs[state.cursor + 1])
    ) {
      const heading = paragraphs[state.cursor];
      const table = paragraphs[state.cursor + 1];
      const pairTokens = this.countTokens(heading) + this.countTokens(table);
      if (group.length > 0 && tokens + pairTokens > this.hardLimit) {
        break;
      }
      group.push(heading, table);
      tokens += pairTokens;
      pairs++;
      state.cursor += 2;
    }

    this.emitWithPending(
      state,
      group,
      `heading and table group (${pairs} ${pairs === 1 ? "pair" : "pairs"})`,
    );
  }

  /**
   * Collects paragraphs up to the next heading. The first paragraph is always
   * admitted so the cursor advances even when it alone exceeds the hard limit.
   */
  private processContent(state: ChunkingState): void {
    const { paragraphs } = state;
    const group: string[] = [];
    let tokens = 0;

    while (state.cursor < paragraphs.length && !isHeading(paragraphs[state.cursor])) {
      const para = paragraphs[state.cursor];
      const paraTokens = this.countTokens(para);
      if (group.length > 0 && tokens + paraTokens > this.hardLimit) {
        break;
      }
      group.push(para);
      tokens += paraTokens;
      state.cursor++;
    }

    const merged = [...state.pending, ...group];
    const pendingCount = state.pending.length;
    state.pending = [];

    if (this.isDeferrable(merged)) {
      state.pending = merged;
      return;
    }

    let reason = tokens > this.hardLimit ? "oversized paragraph" : "paragraph group";
    if (pendingCount > 0) {
      reason += ` + ${pendingCount} pending headings`;
    }
    this.emit(state, merged, reason);
  }

  private forceSplit(state: ChunkingState, heading: string): void {
    const words = splitWords(heading);
    for (let start = 0; start < words.length; start += this.hardLimit) {
      const end = Math.min(start + this.hardLimit, words.length);
      state.chunks.push(
        this.buildChunk(
          [words.slice(start, end).join(" ")],
          `forced split of oversized heading (words ${start + 1}-${end})`,
        ),
      );
    }
  }

  /**
   * Merges trailing headings into the last chunk, or emits them alone when
   * nothing was emitted before.
   */
  private finalize(state: ChunkingState): void {
    if (state.pending.length === 0) {
      return;
    }

    const last = state.chunks[state.chunks.length - 1];
    if (!last) {
      this.emit(state, state.pending, "trailing headings only");
    } else {
      const combined = [...last.paragraphs, ...state.pending];
      if (!allPageBreaks(combined)) {
        state.chunks[state.chunks.length - 1] = this.buildChunk(
          combined,
          `${last.reason} + trailing headings`,
        );
      }
    }
    state.pending = [];
  }

  private flushPending(state: ChunkingState, reason: string): void {
    if (state.pending.length > 0) {
      this.emit(state, state.pending, reason);
      state.pending = [];
    }
  }

  private emitWithPending(state: ChunkingState, group: string[], reason: string): void {
    const pendingCount = state.pending.length;
    const merged = [...state.pending, ...group];
    state.pending = [];
    this.emit(
      state,
      merged,
      pendingCount > 0 ? `${reason} + ${pendingCount} pending headings` : reason,
    );
  }

  /**
   * Appends a chunk unless it is empty or consists solely of page breaks.
   */
  private emit(state: ChunkingState, paragraphs: string[], reason: string): void {
    if (allPageBreaks(paragraphs)) {
      return;
    }
    state.chunks.push(this.buildChunk(paragraphs, reason));
  }

  private buildChunk(paragraphs: string[], reason: string): MarkdownChunk {
    const content = paragraphs.join("\n\n");
    return {
      content,
      paragraphs,
      reason,
      tokenCount: this.countTokens(content),
    };
  }

  private isDeferrable(group: string[]): boolean {
    return (
      group.length >= 1 && group.length <= MAX_PENDING_GROUP_SIZE && group.every(isHeading)
    );
  }
}

/**
 * Convenience wrapper for one-off chunking with the default word counter.
 */
export function chunkMarkdown(
  markdown: string,
  softLimit: number,
  hardLimit: number,
): MarkdownChunk[] {
  return new MarkdownChunker({ softLimit, hardLimit }).chunk(markdown);
}
