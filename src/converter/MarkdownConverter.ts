import fs from "node:fs/promises";
import path from "node:path";
import type { ChatSettings, ContentUnderstandingSettings } from "../config";
import { complete } from "../utils/chat";
import { toError } from "../utils/errors";
import { logger } from "../utils/logger";
import { ContentUnderstandingClient } from "./ContentUnderstandingClient";
import { ConversionError } from "./errors";
import { htmlToMarkdown } from "./htmlToMarkdown";
import type { ConversionResult, DocumentConverter } from "./types";

const PASSTHROUGH_EXTENSIONS = new Set([".md", ".markdown", ".txt"]);
const HTML_EXTENSIONS = new Set([".html", ".htm"]);
const IMAGE_MIME_TYPES: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".webp": "image/webp",
};

export const IMAGE_EXTRACTION_PROMPT =
  "Extract everything you see in this image to markdown. " +
  "Convert all charts such as line, pie and bar charts to markdown tables and include a note that the numbers are approximate.";

const IMAGE_SYSTEM_PROMPT = "You are a helpful assistant.";
const IMAGE_MAX_TOKENS = 2000;

export interface MarkdownConverterSettings {
  chat: ChatSettings;
  contentUnderstanding: ContentUnderstandingSettings;
}

/**
 * Converts source documents to markdown, choosing a strategy by file extension:
 * markdown and text pass through, HTML goes through Turndown, images are
 * transcribed by a multimodal chat model and everything else is sent to the
 * content understanding service.
 */
export class MarkdownConverter implements DocumentConverter {
  private readonly contentUnderstanding: ContentUnderstandingClient;

  constructor(
    private readonly settings: MarkdownConverterSettings,
    contentUnderstanding?: ContentUnderstandingClient,
  ) {
    this.contentUnderstanding =
      contentUnderstanding ?? new ContentUnderstandingClient(settings.contentUnderstanding);
  }

  async convert(sourcePath: string): Promise<ConversionResult> {
    const ext = path.extname(sourcePath).toLowerCase();

    if (PASSTHROUGH_EXTENSIONS.has(ext)) {
      const markdown = (await this.readSource(sourcePath)).toString("utf-8");
      return { markdown, sourcePath, method: "passthrough" };
    }

    if (HTML_EXTENSIONS.has(ext)) {
      const html = (await this.readSource(sourcePath)).toString("utf-8");
      return { markdown: htmlToMarkdown(html), sourcePath, method: "html" };
    }

    const imageMimeType = IMAGE_MIME_TYPES[ext];
    if (imageMimeType) {
      const image = await this.readSource(sourcePath);
      logger.info(`🖼️ Transcribing image ${sourcePath}`);
      const markdown = await complete(IMAGE_EXTRACTION_PROMPT, this.settings.chat, {
        system: IMAGE_SYSTEM_PROMPT,
        imageUrls: [`data:${imageMimeType};base64,${image.toString("base64")}`],
        maxTokens: IMAGE_MAX_TOKENS,
      });
      return { markdown, sourcePath, method: "vision" };
    }

    const markdown = await this.contentUnderstanding.analyze(sourcePath);
    if (!markdown) {
      logger.warn(`⚠️ No markdown content found in ${sourcePath}`);
    }
    return { markdown, sourcePath, method: "content-understanding" };
  }

  /**
   * Converts the source and writes `<basename>.md` into the target directory.
   */
  async convertToFile(
    sourcePath: string,
    targetDir: string,
  ): Promise<ConversionResult & { markdownPath: string }> {
    const result = await this.convert(sourcePath);
    const markdownPath = path.join(targetDir, `${path.basename(sourcePath)}.md`);

    try {
      await fs.mkdir(targetDir, { recursive: true });
      await fs.writeFile(markdownPath, result.markdown, "utf-8");
    } catch (error) {
      throw new ConversionError(
        `Failed to write markdown to ${markdownPath}`,
        sourcePath,
        toError(error),
      );
    }

    logger.info(`📝 Saved ${result.method} markdown for ${sourcePath} to ${markdownPath}`);
    return { ...result, markdownPath };
  }

  private async readSource(sourcePath: string): Promise<Buffer> {
    try {
      return await fs.readFile(sourcePath);
    } catch (error) {
      throw new ConversionError(`Failed to read ${sourcePath}`, sourcePath, toError(error));
    }
  }
}
