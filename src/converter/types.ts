/**
 * How a document was turned into markdown.
 */
export type ConversionMethod = "passthrough" | "html" | "vision" | "content-understanding";

export interface ConversionResult {
  markdown: string;
  sourcePath: string;
  method: ConversionMethod;
}

export interface DocumentConverter {
  convert(sourcePath: string): Promise<ConversionResult>;
}

/**
 * State of a remote analyze operation, decoded from the poll response.
 */
export type AnalyzeOperation =
  | { status: "running" }
  | { status: "succeeded"; markdown: string }
  | { status: "failed"; message: string };
