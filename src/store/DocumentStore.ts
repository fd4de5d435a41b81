import type { Embeddings } from "@langchain/core/embeddings";
import Database, { type Database as DatabaseType } from "better-sqlite3";
import * as sqliteVec from "sqlite-vec";
import type { MarkdownChunk } from "../chunker";
import type { EmbeddingSettings } from "../config";
import { toError } from "../utils/errors";
import { logger } from "../utils/logger";
import { createEmbeddingModel } from "./embeddings/EmbeddingFactory";
import { FixedDimensionEmbeddings } from "./embeddings/FixedDimensionEmbeddings";
import { ConnectionError, StoreError } from "./errors";
import { MIN_EMBEDDING_LENGTH, VECTOR_DIMENSION, createTablesSQL } from "./schema";
import {
  type ChunkRecord,
  type DbChunk,
  type DbDocumentSummary,
  type DbSearchRow,
  type DocumentSummary,
  type SearchResult,
  mapDbChunkToRecord,
} from "./types";

/** Rank constant of Reciprocal Rank Fusion */
const RRF_K = 60;

type InsertChunkParams = [string, string, string, number, string, string];

interface PreparedStatements {
  insertChunk: Database.Statement<InsertChunkParams>;
  insertEmbedding: Database.Statement<[bigint, string]>;
  deleteChunk: Database.Statement<[string]>;
  deleteByDocId: Database.Statement<[string]>;
  deleteByDocName: Database.Statement<[string]>;
  deleteAll: Database.Statement<[]>;
  checkExists: Database.Statement<[string], { id: number }>;
  listDocuments: Database.Statement<[], DbDocumentSummary>;
  getByDocId: Database.Statement<[string], DbChunk>;
  search: Database.Statement<[string, number, string, number], DbSearchRow>;
}

/**
 * Builds the stored record id of a chunk.
 */
export function chunkIdFor(docId: string, chunkNumber: number): string {
  return `${docId}-${chunkNumber}`;
}

/**
 * Wraps a query in double quotes so FTS5 treats it as one phrase instead of
 * parsing operators out of it.
 */
export function escapeFtsQuery(query: string): string {
  return `"${query.replace(/"/g, '""')}"`;
}

/**
 * Ranks results by vector distance and by BM25 score (both lower-is-better)
 * and fuses the two rankings with Reciprocal Rank Fusion.
 */
export function rankResults(rows: DbSearchRow[], limit: number): SearchResult[] {
  const vecRanks = new Map<number, number>();
  const ftsRanks = new Map<number, number>();

  rows
    .filter((row) => row.vec_distance !== null)
    .sort((a, b) => (a.vec_distance ?? 0) - (b.vec_distance ?? 0))
    .forEach((row, index) => vecRanks.set(row.id, index + 1));

  rows
    .filter((row) => row.fts_score !== null)
    .sort((a, b) => (a.fts_score ?? 0) - (b.fts_score ?? 0))
    .forEach((row, index) => ftsRanks.set(row.id, index + 1));

  return rows
    .map((row) => {
      const vecRank = vecRanks.get(row.id);
      const ftsRank = ftsRanks.get(row.id);
      let score = 0;
      if (vecRank !== undefined) {
        score += 1 / (RRF_K + vecRank);
      }
      if (ftsRank !== undefined) {
        score += 1 / (RRF_K + ftsRank);
      }
      return { ...mapDbChunkToRecord(row), score, vecRank, ftsRank };
    })
    .sort((a, b) => b.score - a.score)
    .slice(0, limit);
}

/**
 * Chunk storage on SQLite with sqlite-vec for vector similarity and FTS5 for
 * keyword search. Each indexed document is a set of rows sharing a docId.
 */
export class DocumentStore {
  private readonly db: DatabaseType;
  private embeddings?: Embeddings;
  private statements?: PreparedStatements;

  constructor(
    dbPath: string,
    private readonly embedding: EmbeddingSettings,
  ) {
    if (!dbPath) {
      throw new StoreError("Missing required database path");
    }
    this.db = new Database(dbPath);
  }

  private prepareStatements(): PreparedStatements {
    return {
      insertChunk: this.db.prepare<InsertChunkParams>(
        "INSERT INTO chunks (chunk_id, doc_id, doc_name, chunk_number, content, reason) VALUES (?, ?, ?, ?, ?, ?)",
      ),
      insertEmbedding: this.db.prepare<[bigint, string]>(
        "INSERT INTO chunks_vec (rowid, embedding) VALUES (?, ?)",
      ),
      deleteChunk: this.db.prepare<[string]>("DELETE FROM chunks WHERE chunk_id = ?"),
      deleteByDocId: this.db.prepare<[string]>("DELETE FROM chunks WHERE doc_id = ?"),
      deleteByDocName: this.db.prepare<[string]>("DELETE FROM chunks WHERE doc_name = ?"),
      deleteAll: this.db.prepare<[]>("DELETE FROM chunks"),
      checkExists: this.db.prepare<[string], { id: number }>(
        "SELECT id FROM chunks WHERE doc_id = ? LIMIT 1",
      ),
      listDocuments: this.db.prepare<[], DbDocumentSummary>(
        "SELECT doc_id, doc_name, COUNT(*) AS chunk_count FROM chunks GROUP BY doc_id, doc_name ORDER BY doc_name",
      ),
      getByDocId: this.db.prepare<[string], DbChunk>(
        "SELECT * FROM chunks WHERE doc_id = ? ORDER BY chunk_number",
      ),
      search: this.db.prepare<[string, number, string, number], DbSearchRow>(`
        WITH vec_scores AS (
          SELECT rowid AS id, distance AS vec_distance
          FROM chunks_vec
          WHERE embedding MATCH ?
          ORDER BY distance
          LIMIT ?
        ),
        fts_scores AS (
          SELECT rowid AS id, bm25(chunks_fts, 1.0, 2.0) AS fts_score
          FROM chunks_fts
          WHERE chunks_fts MATCH ?
          ORDER BY fts_score
          LIMIT ?
        )
        SELECT c.*, v.vec_distance, f.fts_score
        FROM chunks c
        LEFT JOIN vec_scores v ON c.id = v.id
        LEFT JOIN fts_scores f ON c.id = f.id
        WHERE v.id IS NOT NULL OR f.id IS NOT NULL
      `),
    };
  }

  private requireReady(): { embeddings: Embeddings; statements: PreparedStatements } {
    if (!this.embeddings || !this.statements) {
      throw new StoreError("DocumentStore is not initialized");
    }
    return { embeddings: this.embeddings, statements: this.statements };
  }

  /**
   * Loads sqlite-vec, creates the schema and probes the embedding model so a
   * model wider than the vector column fails here rather than on first insert.
   */
  async initialize(): Promise<void> {
    try {
      sqliteVec.load(this.db);
      this.db.exec(createTablesSQL);
      this.statements = this.prepareStatements();

      const embeddings = new FixedDimensionEmbeddings(
        createEmbeddingModel(this.embedding),
        VECTOR_DIMENSION,
        this.embedding.model,
      );
      await embeddings.embedQuery("test");
      this.embeddings = embeddings;
    } catch (error) {
      if (error instanceof StoreError) {
        throw error;
      }
      throw new ConnectionError("Failed to initialize database connection", toError(error));
    }
  }

  async shutdown(): Promise<void> {
    this.db.close();
  }

  /**
   * Embeds every chunk long enough to be embedded.
   * @returns Vectors keyed by chunk index
   */
  private async embedChunks(
    embeddings: Embeddings,
    chunks: MarkdownChunk[],
  ): Promise<Map<number, number[]>> {
    const embeddable = chunks
      .map((chunk, index) => ({ content: chunk.content, index }))
      .filter(({ content }) => content.length >= MIN_EMBEDDING_LENGTH);
    if (embeddable.length === 0) {
      return new Map();
    }
    const vectors = await embeddings.embedDocuments(embeddable.map(({ content }) => content));
    return new Map(embeddable.map(({ index }, i) => [index, vectors[i]] as const));
  }

  /**
   * Inserts the rows of one document. Must run inside a transaction.
   */
  private writeChunks(
    statements: PreparedStatements,
    docId: string,
    docName: string,
    chunks: MarkdownChunk[],
    vectors: Map<number, number[]>,
  ): void {
    for (const [index, chunk] of chunks.entries()) {
      const chunkId = chunkIdFor(docId, index + 1);
      statements.deleteChunk.run(chunkId);
      const result = statements.insertChunk.run(
        chunkId,
        docId,
        docName,
        index + 1,
        chunk.content,
        chunk.reason,
      );
      const vector = vectors.get(index);
      if (vector) {
        statements.insertEmbedding.run(BigInt(result.lastInsertRowid), JSON.stringify(vector));
      }
    }
  }

  /**
   * Stores the chunks of one document, replacing rows with the same chunk id.
   * Chunks shorter than MIN_EMBEDDING_LENGTH get no embedding.
   * @returns Number of chunks written
   */
  async upsert(docId: string, docName: string, chunks: MarkdownChunk[]): Promise<number> {
    const { embeddings, statements } = this.requireReady();

    try {
      const vectors = await this.embedChunks(embeddings, chunks);
      this.db.transaction(() => this.writeChunks(statements, docId, docName, chunks, vectors))();

      logger.debug(`🗄️ Stored ${chunks.length} chunks for ${docName} (${vectors.size} embedded)`);
      return chunks.length;
    } catch (error) {
      throw new ConnectionError(`Failed to store chunks for ${docName}`, toError(error));
    }
  }

  /**
   * Replaces every stored chunk of a document. The new chunks are embedded
   * before anything is deleted, and the delete and inserts share one
   * transaction, so a failure leaves the old rows in place.
   * @returns Number of previously stored chunks removed
   */
  async replaceDocument(docId: string, docName: string, chunks: MarkdownChunk[]): Promise<number> {
    const { embeddings, statements } = this.requireReady();

    try {
      const vectors = await this.embedChunks(embeddings, chunks);
      const removed = this.db.transaction(() => {
        const { changes } = statements.deleteByDocId.run(docId);
        this.writeChunks(statements, docId, docName, chunks, vectors);
        return changes;
      })();

      logger.debug(
        `🗄️ Replaced ${removed} chunks of ${docName} with ${chunks.length} (${vectors.size} embedded)`,
      );
      return removed;
    } catch (error) {
      throw new ConnectionError(`Failed to replace chunks for ${docName}`, toError(error));
    }
  }

  /**
   * Hybrid search over all stored chunks, best first.
   */
  async query(text: string, limit: number): Promise<SearchResult[]> {
    const { embeddings, statements } = this.requireReady();

    try {
      const embedding = await embeddings.embedQuery(text);
      const rows = statements.search.all(
        JSON.stringify(embedding),
        limit,
        escapeFtsQuery(text),
        limit,
      );
      return rankResults(rows, limit);
    } catch (error) {
      throw new ConnectionError(`Failed to search for "${text}"`, toError(error));
    }
  }

  /**
   * @returns Number of chunks removed
   */
  async deleteByDocId(docId: string): Promise<number> {
    const { statements } = this.requireReady();
    try {
      return statements.deleteByDocId.run(docId).changes;
    } catch (error) {
      throw new ConnectionError(`Failed to delete document ${docId}`, toError(error));
    }
  }

  /**
   * @returns Number of chunks removed
   */
  async deleteByDocName(docName: string): Promise<number> {
    const { statements } = this.requireReady();
    try {
      return statements.deleteByDocName.run(docName).changes;
    } catch (error) {
      throw new ConnectionError(`Failed to delete document ${docName}`, toError(error));
    }
  }

  async checkDocumentExists(docId: string): Promise<boolean> {
    const { statements } = this.requireReady();
    try {
      return statements.checkExists.get(docId) !== undefined;
    } catch (error) {
      throw new ConnectionError("Failed to check document existence", toError(error));
    }
  }

  async getChunks(docId: string): Promise<ChunkRecord[]> {
    const { statements } = this.requireReady();
    try {
      return statements.getByDocId.all(docId).map(mapDbChunkToRecord);
    } catch (error) {
      throw new ConnectionError(`Failed to read chunks of ${docId}`, toError(error));
    }
  }

  async listDocuments(): Promise<DocumentSummary[]> {
    const { statements } = this.requireReady();
    try {
      return statements.listDocuments.all().map((row) => ({
        docId: row.doc_id,
        docName: row.doc_name,
        chunkCount: row.chunk_count,
      }));
    } catch (error) {
      throw new ConnectionError("Failed to list documents", toError(error));
    }
  }

  /**
   * Removes every stored chunk.
   * @returns Number of chunks removed
   */
  async clear(): Promise<number> {
    const { statements } = this.requireReady();
    try {
      return statements.deleteAll.run().changes;
    } catch (error) {
      throw new ConnectionError("Failed to clear the store", toError(error));
    }
  }
}
