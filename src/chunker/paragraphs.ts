const PARAGRAPH_SEPARATOR = /\n\s*\n/;
const HEADING_PATTERN = /^(#+)\s/;
const LIST_ITEM_PATTERN = /^(\d+\.\s+|\\?[-*]\s+)/;
const PAGE_BREAK_MARKERS = ["<!-- pagebreak -->", "pagebreak"];

/**
 * Splits markdown on blank lines. Whitespace-only fragments are discarded;
 * every other paragraph is kept verbatim.
 */
export function splitIntoParagraphs(markdown: string): string[] {
  return markdown.split(PARAGRAPH_SEPARATOR).filter((para) => para.trim().length > 0);
}

/**
 * Counts whitespace-delimited words.
 */
export function countWords(text: string): number {
  return splitWords(text).length;
}

export function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}

/**
 * Returns the number of leading `#` markers, or 0 when the paragraph is not a heading.
 */
export function getHeadingLevel(para: string): number {
  const match = para.trim().match(HEADING_PATTERN);
  return match ? match[1].length : 0;
}

export function isHeading(para: string): boolean {
  return getHeadingLevel(para) > 0;
}

/**
 * Ordered (`1. `) or unordered (`- `, `* `, optionally escaped as `\- `) list item.
 */
export function isListItem(para: string): boolean {
  return LIST_ITEM_PATTERN.test(para.trim());
}

export function isTable(para: string): boolean {
  return para.includes("|") || para.toLowerCase().includes("<table>");
}

export function isPageBreak(para: string): boolean {
  const lowered = para.trim().toLowerCase();
  return PAGE_BREAK_MARKERS.some((marker) => lowered.includes(marker));
}

export function allPageBreaks(paras: string[]): boolean {
  return paras.every(isPageBreak);
}
