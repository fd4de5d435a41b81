export { ContentUnderstandingClient, decodeAnalyzeOperation } from "./ContentUnderstandingClient";
export { ConversionError } from "./errors";
export { htmlToMarkdown } from "./htmlToMarkdown";
export { IMAGE_EXTRACTION_PROMPT, MarkdownConverter } from "./MarkdownConverter";
export type { MarkdownConverterSettings } from "./MarkdownConverter";
export type { AnalyzeOperation, ConversionMethod, ConversionResult, DocumentConverter } from "./types";
