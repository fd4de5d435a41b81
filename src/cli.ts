#!/usr/bin/env node
import "dotenv/config";
import { Command, InvalidArgumentError } from "commander";
import fs from "node:fs/promises";
import packageJson from "../package.json";
import { type AppConfig, loadConfig } from "./config";
import { MarkdownConverter } from "./converter";
import { IndexingService } from "./store";
import {
  AssessTool,
  ChunkTool,
  ConvertTool,
  IndexTool,
  ListDocumentsTool,
  RemoveTool,
  SearchTool,
} from "./tools";
import { LogLevel, setLogLevel } from "./utils/logger";

const formatOutput = (data: unknown) => JSON.stringify(data, null, 2);

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

async function main() {
  const config: AppConfig = loadConfig();
  let indexer: IndexingService | undefined;

  // The store (and its embedding model) is only opened by commands that need it
  const openIndexer = async (): Promise<IndexingService> => {
    if (!indexer) {
      const service = new IndexingService(config);
      await service.initialize();
      indexer = service;
    }
    return indexer;
  };

  const shutdown = async () => {
    if (indexer) await indexer.shutdown();
  };

  process.on("SIGINT", () => {
    void shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error("Error during shutdown:", error);
        process.exit(1);
      },
    );
  });

  const program = new Command();

  program
    .name("md-rag")
    .description("Convert documents to markdown, chunk them and index them for retrieval")
    .version(packageJson.version)
    .option("--verbose", "Enable verbose (debug) logging", false)
    .option("--silent", "Disable all logging except errors", false);

  program
    .command("chunk <input> <outputDir>")
    .description("Split a markdown file into chunk_<n>.md files and a chunks.log")
    .option("--soft-limit <number>", "Soft token limit", parsePositiveInt)
    .option("--hard-limit <number>", "Hard token limit", parsePositiveInt)
    .action(
      async (
        input: string,
        outputDir: string,
        options: { softLimit?: number; hardLimit?: number },
      ) => {
        const result = await new ChunkTool(config.chunk).execute({
          inputPath: input,
          outputDir,
          softLimit: options.softLimit,
          hardLimit: options.hardLimit,
        });
        console.log(`✅ Wrote ${result.chunkCount} chunks to ${result.outputDir}`);
      },
    );

  program
    .command("convert <source> <targetDir>")
    .description("Convert a document to <targetDir>/<basename>.md")
    .action(async (source: string, targetDir: string) => {
      const converter = new MarkdownConverter({
        chat: config.chat,
        contentUnderstanding: config.contentUnderstanding,
      });
      const result = await new ConvertTool(converter).execute({ sourcePath: source, targetDir });
      console.log(`✅ Converted (${result.method}) to ${result.markdownPath}`);
    });

  program
    .command("index <source>")
    .description("Convert, chunk, embed and store a document")
    .option("-o, --output-dir <dir>", "Directory for markdown and chunk files")
    .option("--reindex", "Replace the document if it is already indexed", false)
    .action(async (source: string, options: { outputDir?: string; reindex: boolean }) => {
      const result = await new IndexTool(await openIndexer()).execute({
        sourcePath: source,
        outputDir: options.outputDir,
        reindex: options.reindex,
      });
      console.log(result.skipped ? `⏭️ ${result.message}` : `✅ ${result.message}`);
    });

  program
    .command("search <query>")
    .description("Search indexed chunks with hybrid vector and keyword ranking")
    .option("-l, --limit <number>", "Maximum number of results", parsePositiveInt, 5)
    .action(async (query: string, options: { limit: number }) => {
      const result = await new SearchTool(await openIndexer()).execute({
        query,
        limit: options.limit,
      });
      console.log(formatOutput(result.results));
    });

  program
    .command("remove")
    .description("Remove an indexed document by id or by name")
    .option("--doc-id <id>", "Document id")
    .option("--doc-name <name>", "Document file name")
    .action(async (options: { docId?: string; docName?: string }) => {
      const result = await new RemoveTool(await openIndexer()).execute(options);
      console.log(`✅ ${result.message}`);
    });

  program
    .command("list")
    .description("List indexed documents")
    .action(async () => {
      const result = await new ListDocumentsTool(await openIndexer()).execute();
      console.log(formatOutput(result.documents));
    });

  program
    .command("clear")
    .description("Remove every indexed document")
    .action(async () => {
      const removed = await (await openIndexer()).clear();
      console.log(`✅ Removed ${removed} chunks`);
    });

  program
    .command("assess <question>")
    .description("Answer a question from the indexed documents with the chat model")
    .option("--rubric <file>", "Grading rubric appended to the system prompt")
    .option("--template <file>", "Prompt template with {question} and {context} placeholders")
    .option("-l, --limit <number>", "Number of chunks retrieved as context", parsePositiveInt, 3)
    .action(
      async (
        question: string,
        options: { rubric?: string; template?: string; limit: number },
      ) => {
        const promptTemplate = options.template
          ? await fs.readFile(options.template, "utf-8")
          : undefined;
        const result = await new AssessTool(await openIndexer(), config.chat).execute({
          question,
          rubricPath: options.rubric,
          promptTemplate,
          limit: options.limit,
        });
        console.log(result.answer);
        console.log(
          formatOutput(
            result.sources.map(({ chunkId, docName, score }) => ({ chunkId, docName, score })),
          ),
        );
      },
    );

  // Set the log level after global options are parsed, before any command runs
  program.hook("preAction", (thisCommand) => {
    const options = thisCommand.opts<{ verbose: boolean; silent: boolean }>();
    if (options.silent) {
      setLogLevel(LogLevel.ERROR);
    } else if (options.verbose) {
      setLogLevel(LogLevel.DEBUG);
    }
  });

  try {
    await program.parseAsync();
  } catch (error) {
    console.error("Error:", error instanceof Error ? error.message : String(error));
    await shutdown();
    process.exit(1);
  }

  await shutdown();
  process.exit(0);
}

main().catch((error: unknown) => {
  console.error("Fatal error:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
