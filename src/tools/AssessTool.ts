import fs from "node:fs/promises";
import { z } from "zod";
import type { ChatSettings } from "../config";
import type { IndexingService, SearchResult } from "../store";
import { complete } from "../utils/chat";
import { toError } from "../utils/errors";
import { logger } from "../utils/logger";
import { ToolError, formatIssues } from "./errors";

export const NO_CONTEXT = "No relevant information found.";

export const DEFAULT_ASSESS_SYSTEM_PROMPT =
  "You are an assessor. Answer strictly from the supplied context and say so when the context does not contain the answer.";

/** Placeholders: {question} and {context} */
export const DEFAULT_ASSESS_PROMPT_TEMPLATE =
  "Answer the question below using only the following information.\n\nQuestion: {question}\n\nInformation:\n{context}";

const ASSESS_MAX_TOKENS = 1000;

const assessArgsSchema = z.object({
  question: z.string().trim().min(1, "Question must not be empty"),
  rubricPath: z.string().min(1).optional(),
  promptTemplate: z.string().min(1).optional(),
  limit: z.number().int().positive().default(3),
});

export type AssessToolOptions = z.input<typeof assessArgsSchema>;

export interface AssessToolResult {
  answer: string;
  sources: SearchResult[];
}

/**
 * Joins search hits into the context block of the prompt.
 */
export function buildContext(results: SearchResult[]): string {
  if (results.length === 0) {
    return NO_CONTEXT;
  }
  return results
    .map((result) => `[${result.docName} #${result.chunkNumber}]\n${result.content}`)
    .join("\n\n---\n\n");
}

export function fillPromptTemplate(template: string, question: string, context: string): string {
  // Replacer functions keep "$" sequences in the values literal
  return template.replaceAll("{question}", () => question).replaceAll("{context}", () => context);
}

/**
 * Answers a question from the indexed chunks with the chat model, optionally
 * graded against a rubric appended to the system prompt.
 */
export class AssessTool {
  readonly name = "assess";

  constructor(
    private readonly indexer: Pick<IndexingService, "search">,
    private readonly chat: ChatSettings,
  ) {}

  private async buildSystemPrompt(rubricPath: string | undefined): Promise<string> {
    if (!rubricPath) {
      return DEFAULT_ASSESS_SYSTEM_PROMPT;
    }
    let rubric: string;
    try {
      rubric = (await fs.readFile(rubricPath, "utf-8")).trim();
    } catch (error) {
      const cause = toError(error);
      throw new ToolError(
        `Failed to read rubric ${rubricPath}: ${cause?.message ?? String(error)}`,
        this.name,
        cause,
      );
    }
    if (!rubric) {
      logger.warn(`⚠️ Rubric ${rubricPath} is empty, assessing without it`);
      return DEFAULT_ASSESS_SYSTEM_PROMPT;
    }
    return `${DEFAULT_ASSESS_SYSTEM_PROMPT}\n\nGrading Rubric:\n${rubric}`;
  }

  async execute(options: AssessToolOptions): Promise<AssessToolResult> {
    const parsed = assessArgsSchema.safeParse(options);
    if (!parsed.success) {
      throw new ToolError(`Invalid arguments: ${formatIssues(parsed.error.issues)}`, this.name);
    }
    const { question, rubricPath, limit } = parsed.data;
    const template = parsed.data.promptTemplate ?? DEFAULT_ASSESS_PROMPT_TEMPLATE;

    const system = await this.buildSystemPrompt(rubricPath);

    logger.info(`⚖️ Assessing: ${question}`);

    try {
      const sources = await this.indexer.search(question, limit);
      logger.debug(`📚 Retrieved ${sources.length} context chunks`);

      const prompt = fillPromptTemplate(template, question, buildContext(sources));
      const answer = await complete(prompt, this.chat, {
        system,
        maxTokens: ASSESS_MAX_TOKENS,
      });
      return { answer: answer.trim(), sources };
    } catch (error) {
      const cause = toError(error);
      throw new ToolError(
        `Failed to assess "${question}": ${cause?.message ?? String(error)}`,
        this.name,
        cause,
      );
    }
  }
}
