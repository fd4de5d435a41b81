import fs from "node:fs";
import path from "node:path";
import { MarkdownChunker, saveChunks } from "../chunker";
import type { AppConfig } from "../config";
import { MarkdownConverter } from "../converter";
import { logger } from "../utils/logger";
import { DocumentStore } from "./DocumentStore";
import { StoreError } from "./errors";
import type { DocumentSummary, SearchResult } from "./types";

export const DB_FILE_NAME = "documents.db";

export interface IndexOptions {
  /** Defaults to the configured output directory */
  outputDir?: string;
  /** Replace an already indexed document instead of skipping it */
  reindex?: boolean;
}

export interface IndexResult {
  docId: string;
  docName: string;
  chunkCount: number;
  markdownPath: string;
  chunkDir: string;
  /** True when the document was already indexed and left untouched */
  skipped: boolean;
}

/**
 * Document identifier: the file's base name in URL-safe base64, padding kept.
 */
export function docIdFor(docName: string): string {
  return Buffer.from(docName, "utf-8").toString("base64").replace(/\+/g, "-").replace(/\//g, "_");
}

/**
 * Runs the ingestion pipeline (convert, chunk, save, embed, store) and gives
 * access to the indexed documents.
 */
export class IndexingService {
  private readonly store: DocumentStore;
  private readonly converter: MarkdownConverter;
  private readonly chunker: MarkdownChunker;

  constructor(private readonly config: AppConfig) {
    try {
      fs.mkdirSync(config.storePath, { recursive: true });
    } catch (error) {
      logger.error(`⚠️ Failed to create database directory ${config.storePath}: ${error}`);
    }
    const dbPath = path.join(config.storePath, DB_FILE_NAME);
    logger.debug(`💾 Using database ${dbPath}`);

    this.store = new DocumentStore(dbPath, config.embedding);
    this.converter = new MarkdownConverter({
      chat: config.chat,
      contentUnderstanding: config.contentUnderstanding,
    });
    this.chunker = new MarkdownChunker(config.chunk);
  }

  async initialize(): Promise<void> {
    await this.store.initialize();
  }

  async shutdown(): Promise<void> {
    await this.store.shutdown();
  }

  async indexFile(sourcePath: string, options: IndexOptions = {}): Promise<IndexResult> {
    const outputDir = options.outputDir ?? this.config.outputDir;
    const docName = path.basename(sourcePath);
    const docId = docIdFor(docName);

    const { markdown, markdownPath } = await this.converter.convertToFile(
      sourcePath,
      outputDir,
    );
    const chunks = this.chunker.chunk(markdown);
    const chunkDir = path.join(outputDir, docName);
    await saveChunks(chunks, chunkDir);

    const result = { docId, docName, chunkCount: chunks.length, markdownPath, chunkDir };

    if (await this.store.checkDocumentExists(docId)) {
      if (!options.reindex) {
        logger.info(`⏭️ ${docName} is already indexed as ${docId}, skipping`);
        return { ...result, skipped: true };
      }
      const removed = await this.store.replaceDocument(docId, docName, chunks);
      logger.info(
        `🔄 Replaced ${removed} previously indexed chunks of ${docName} with ${chunks.length}`,
      );
      return { ...result, skipped: false };
    }

    await this.store.upsert(docId, docName, chunks);
    logger.info(`✅ Indexed ${chunks.length} chunks of ${docName} as ${docId}`);
    return { ...result, skipped: false };
  }

  async search(query: string, limit: number): Promise<SearchResult[]> {
    return this.store.query(query, limit);
  }

  /**
   * Removes a document by id or by name. Exactly one of the two must be given.
   * @returns Number of chunks removed
   */
  async removeDocument(target: { docId?: string; docName?: string }): Promise<number> {
    const { docId, docName } = target;
    if (docId && docName) {
      throw new StoreError("Specify either a document id or a document name, not both");
    }
    if (docId) {
      return this.store.deleteByDocId(docId);
    }
    if (docName) {
      return this.store.deleteByDocName(docName);
    }
    throw new StoreError("A document id or a document name is required");
  }

  async listDocuments(): Promise<DocumentSummary[]> {
    return this.store.listDocuments();
  }

  async clear(): Promise<number> {
    return this.store.clear();
  }
}
