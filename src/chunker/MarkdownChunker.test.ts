import { describe, expect, it, vi } from "vitest";
import { InvalidChunkLimitError } from "./errors";
import { MarkdownChunker, chunkMarkdown } from "./MarkdownChunker";
import { splitIntoParagraphs } from "./paragraphs";

vi.mock("../utils/logger");

const contents = (markdown: string, softLimit: number, hardLimit: number) =>
  chunkMarkdown(markdown, softLimit, hardLimit).map((chunk) => chunk.content);

describe("MarkdownChunker", () => {
  describe("basic grouping", () => {
    it("should return no chunks for empty or blank input", () => {
      expect(chunkMarkdown("", 300, 800)).toEqual([]);
      expect(chunkMarkdown("\n\n   \n\n", 300, 800)).toEqual([]);
    });

    it("should keep a heading together with the body under it", () => {
      const result = chunkMarkdown("# Title\n\nSome body text.", 300, 800);
      expect(result).toEqual([
        {
          content: "# Title\n\nSome body text.",
          paragraphs: ["# Title", "Some body text."],
          reason: "content under heading level 1",
          tokenCount: 5,
        },
      ]);
    });

    it("should emit a lone heading at the end of input", () => {
      const result = chunkMarkdown("# Title\n\n", 300, 800);
      expect(result).toEqual([
        {
          content: "# Title",
          paragraphs: ["# Title"],
          reason: "trailing headings only",
          tokenCount: 2,
        },
      ]);
    });

    it("should split plain paragraphs at the hard limit", () => {
      const result = chunkMarkdown("one two\n\nthree four\n\nfive six", 1, 4);
      expect(result.map((c) => c.content)).toEqual(["one two\n\nthree four", "five six"]);
      expect(result.map((c) => c.reason)).toEqual(["paragraph group", "paragraph group"]);
    });

    it("should continue a heading group that hit the hard limit as plain content", () => {
      const result = chunkMarkdown("# H\n\none two\n\nthree four", 1, 4);
      expect(result.map((c) => [c.content, c.reason])).toEqual([
        ["# H\n\none two", "content under heading level 1"],
        ["three four", "paragraph group"],
      ]);
    });
  });

  describe("heading levels", () => {
    it("should include deeper subheadings and stop at a same-level heading", () => {
      const markdown = "# A\n\nintro\n\n## B\n\nbody b\n\n# C\n\nbody c";
      const result = chunkMarkdown(markdown, 300, 800);
      expect(result).toEqual([
        {
          content: "# A\n\nintro\n\n## B\n\nbody b",
          paragraphs: ["# A", "intro", "## B", "body b"],
          reason: "content under heading level 1",
          tokenCount: 7,
        },
        {
          content: "# C\n\nbody c",
          paragraphs: ["# C", "body c"],
          reason: "content under heading level 1",
          tokenCount: 4,
        },
      ]);
    });

    it("should stop a subsection group at a shallower heading", () => {
      const markdown = "## Sub\n\nsub body\n\n# Top\n\ntop body";
      expect(contents(markdown, 300, 800)).toEqual([
        "## Sub\n\nsub body",
        "# Top\n\ntop body",
      ]);
    });

    it("should emit more than six consecutive headings as their own chunk", () => {
      const markdown = "# A\n\n## B\n\n## C\n\n## D\n\n## E\n\n## F\n\n## G";
      const result = chunkMarkdown(markdown, 300, 800);
      expect(result).toHaveLength(1);
      expect(result[0].paragraphs).toEqual(["# A", "## B", "## C", "## D", "## E", "## F", "## G"]);
      expect(result[0].reason).toBe("heading-only group under heading level 1");
    });
  });

  describe("pending headings", () => {
    it("should merge a heading-only group into the following heading group", () => {
      const result = chunkMarkdown("## A\n\n# B\n\nBody.", 300, 800);
      expect(result).toEqual([
        {
          content: "## A\n\n# B\n\nBody.",
          paragraphs: ["## A", "# B", "Body."],
          reason: "content under heading level 1 + 1 pending headings",
          tokenCount: 5,
        },
      ]);
    });

    it("should merge pending headings into following plain content", () => {
      const result = chunkMarkdown("# A\n\none two three four five", 1, 5);
      expect(result).toEqual([
        {
          content: "# A\n\none two three four five",
          paragraphs: ["# A", "one two three four five"],
          reason: "paragraph group + 1 pending headings",
          tokenCount: 7,
        },
      ]);
    });

    it("should merge pending headings into a heading and table group", () => {
      const result = chunkMarkdown("## A\n\n# B\n\n| x | y |", 300, 800);
      expect(result).toHaveLength(1);
      expect(result[0].paragraphs).toEqual(["## A", "# B", "| x | y |"]);
      expect(result[0].reason).toBe("heading and table group (1 pair) + 1 pending headings");
    });

    it("should append trailing headings to the last chunk", () => {
      const result = chunkMarkdown("Body text.\n\n# End", 300, 800);
      expect(result).toEqual([
        {
          content: "Body text.\n\n# End",
          paragraphs: ["Body text.", "# End"],
          reason: "paragraph group + trailing headings",
          tokenCount: 4,
        },
      ]);
    });
  });

  describe("tables", () => {
    it("should group a heading with the table right after it", () => {
      const result = chunkMarkdown("## A\n\n| x | y |\n\nUnrelated text.", 300, 800);
      expect(result).toEqual([
        {
          content: "## A\n\n| x | y |",
          paragraphs: ["## A", "| x | y |"],
          reason: "heading and table group (1 pair)",
          tokenCount: 7,
        },
        {
          content: "Unrelated text.",
          paragraphs: ["Unrelated text."],
          reason: "paragraph group",
          tokenCount: 2,
        },
      ]);
    });

    it("should collect at most two heading and table pairs per chunk", () => {
      const markdown = "# T1\n\n| a |\n\n# T2\n\n| b |\n\n# T3\n\n| c |";
      const result = chunkMarkdown(markdown, 300, 800);
      expect(result.map((c) => [c.content, c.reason])).toEqual([
        ["# T1\n\n| a |\n\n# T2\n\n| b |", "heading and table group (2 pairs)"],
        ["# T3\n\n| c |", "heading and table group (1 pair)"],
      ]);
    });

    it("should start a new chunk when the next pair would overflow", () => {
      const markdown = "# T1\n\n| a |\n\n# T2\n\n| b |";
      expect(contents(markdown, 1, 6)).toEqual(["# T1\n\n| a |", "# T2\n\n| b |"]);
    });

    it("should always admit the first pair even when it exceeds the hard limit", () => {
      const result = chunkMarkdown("# Wide\n\n| a | b | c |", 1, 3);
      expect(result).toHaveLength(1);
      expect(result[0].content).toBe("# Wide\n\n| a | b | c |");
      expect(result[0].tokenCount).toBe(9);
    });

    it("should recognize HTML tables", () => {
      const result = chunkMarkdown("# Data\n\n<TABLE><tr><td>1</td></tr></TABLE>", 300, 800);
      expect(result[0].reason).toBe("heading and table group (1 pair)");
    });
  });

  describe("oversized content", () => {
    it("should force-split a heading longer than the hard limit into word windows", () => {
      const result = chunkMarkdown("# one two three four five six seven", 1, 3);
      expect(result.map((c) => [c.content, c.reason])).toEqual([
        ["# one two", "forced split of oversized heading (words 1-3)"],
        ["three four five", "forced split of oversized heading (words 4-6)"],
        ["six seven", "forced split of oversized heading (words 7-8)"],
      ]);
    });

    it("should flush pending headings before force-splitting", () => {
      const result = chunkMarkdown("## Lead\n\n# one two three four five", 1, 3);
      expect(result.map((c) => [c.content, c.reason])).toEqual([
        ["## Lead", "pending headings flushed before oversized heading"],
        ["# one two", "forced split of oversized heading (words 1-3)"],
        ["three four five", "forced split of oversized heading (words 4-6)"],
      ]);
    });

    it("should admit a single paragraph that exceeds the hard limit", () => {
      const longParagraph = Array.from({ length: 1000 }, (_, i) => `w${i}`).join(" ");
      const result = chunkMarkdown(longParagraph, 300, 800);
      expect(result).toHaveLength(1);
      expect(result[0].content).toBe(longParagraph);
      expect(result[0].tokenCount).toBe(1000);
      expect(result[0].reason).toBe("oversized paragraph");
    });

    it("should start a new chunk after an oversized paragraph", () => {
      const result = chunkMarkdown("a b c d e f g h\n\nnext para", 1, 5);
      expect(result.map((c) => [c.content, c.reason])).toEqual([
        ["a b c d e f g h", "oversized paragraph"],
        ["next para", "paragraph group"],
      ]);
    });
  });

  describe("page breaks", () => {
    it("should keep a page break that shares a chunk with text", () => {
      const result = chunkMarkdown("<!-- pagebreak -->\n\nSome text.", 300, 800);
      expect(result).toEqual([
        {
          content: "<!-- pagebreak -->\n\nSome text.",
          paragraphs: ["<!-- pagebreak -->", "Some text."],
          reason: "paragraph group",
          tokenCount: 5,
        },
      ]);
    });

    it("should drop a chunk made only of a page break", () => {
      expect(chunkMarkdown("<!-- PageBreak -->", 300, 800)).toEqual([]);
    });

    it("should skip a page break that precedes a list item", () => {
      const result = chunkMarkdown("<!-- pagebreak -->\n\n- first\n\n- second", 300, 800);
      expect(result.map((c) => c.content)).toEqual(["- first\n\n- second"]);
    });

    it("should drop trailing headings that are only page-break markers", () => {
      expect(chunkMarkdown("# pagebreak", 300, 800)).toEqual([]);
    });

    it("should drop pending page-break headings instead of flushing them before a forced split", () => {
      const result = chunkMarkdown("# pagebreak\n\n# one two three four five", 1, 3);
      expect(result.map((c) => [c.content, c.reason])).toEqual([
        ["# one two", "forced split of oversized heading (words 1-3)"],
        ["three four five", "forced split of oversized heading (words 4-6)"],
      ]);
    });

    it("should leave the last chunk unchanged when it and the trailing headings are all page breaks", () => {
      const result = chunkMarkdown(
        "# pagebreak pagebreak pagebreak pagebreak\n\n# pagebreak",
        1,
        3,
      );
      expect(result).toEqual([
        {
          content: "# pagebreak pagebreak",
          paragraphs: ["# pagebreak pagebreak"],
          reason: "forced split of oversized heading (words 1-3)",
          tokenCount: 3,
        },
        {
          content: "pagebreak pagebreak",
          paragraphs: ["pagebreak pagebreak"],
          reason: "forced split of oversized heading (words 4-5)",
          tokenCount: 2,
        },
      ]);
    });
  });

  describe("options", () => {
    it("should reject limits that are not positive integers", () => {
      expect(() => new MarkdownChunker({ softLimit: 0, hardLimit: 10 })).toThrow(
        InvalidChunkLimitError,
      );
      expect(() => new MarkdownChunker({ softLimit: 10, hardLimit: 1.5 })).toThrow(
        "hardLimit must be a positive integer, got 1.5",
      );
    });

    it("should not change the result when only the soft limit changes", () => {
      const markdown = "# A\n\nalpha beta\n\n## B\n\ngamma\n\n# C\n\n| t |";
      expect(contents(markdown, 1, 800)).toEqual(contents(markdown, 500, 800));
    });

    it("should use a custom token counter", () => {
      const chunker = new MarkdownChunker({
        softLimit: 10,
        hardLimit: 20,
        countTokens: (text) => text.length,
      });
      const result = chunker.chunk("alpha beta\n\ngamma delta\n\nepsilon");
      expect(result.map((c) => [c.content, c.tokenCount])).toEqual([
        ["alpha beta", 10],
        ["gamma delta\n\nepsilon", 20],
      ]);
    });

    it("should not carry state between calls", () => {
      const chunker = new MarkdownChunker({ softLimit: 300, hardLimit: 800 });
      expect(chunker.chunk("# Only").map((c) => c.content)).toEqual(["# Only"]);
      expect(chunker.chunk("# Only").map((c) => c.content)).toEqual(["# Only"]);
    });
  });

  it("should emit every paragraph exactly once and in order", () => {
    const markdown = [
      "# Guide",
      "Intro paragraph.",
      "## Setup",
      "1. Install",
      "2. Configure",
      "## Reference",
      "| key | value |",
      "Closing words.",
      "# Appendix",
    ].join("\n\n");
    const result = chunkMarkdown(markdown, 3, 6);
    const emitted = result.flatMap((chunk) => chunk.paragraphs);
    expect(emitted).toEqual(splitIntoParagraphs(markdown));
  });
});
