import { gfm } from "@joplin/turndown-plugin-gfm";
import TurndownService from "turndown";

let turndownService: TurndownService | undefined;

function getTurndownService(): TurndownService {
  if (!turndownService) {
    turndownService = new TurndownService({
      headingStyle: "atx",
      hr: "---",
      bulletListMarker: "-",
      codeBlockStyle: "fenced",
      emDelimiter: "_",
      strongDelimiter: "**",
      linkStyle: "inlined",
    });
    turndownService.use(gfm);
    turndownService.remove(["script", "style"]);
  }
  return turndownService;
}

/**
 * Converts an HTML document to markdown with ATX headings and GFM tables,
 * so the chunker can recognize both.
 */
export function htmlToMarkdown(html: string): string {
  return getTurndownService().turndown(html);
}
