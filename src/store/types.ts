/**
 * Row of the chunks table.
 */
export interface DbChunk {
  id: number;
  chunk_id: string;
  doc_id: string;
  doc_name: string;
  chunk_number: number;
  content: string;
  reason: string;
}

/**
 * Row returned by the hybrid search query. Distances are lower-is-better.
 */
export interface DbSearchRow extends DbChunk {
  vec_distance: number | null;
  fts_score: number | null;
}

export interface DbDocumentSummary {
  doc_id: string;
  doc_name: string;
  chunk_count: number;
}

/**
 * A stored chunk of an indexed document.
 */
export interface ChunkRecord {
  /** `<docId>-<chunkNumber>` */
  chunkId: string;
  docId: string;
  docName: string;
  /** 1-based position within the document */
  chunkNumber: number;
  content: string;
  reason: string;
}

export interface SearchResult extends ChunkRecord {
  /** Reciprocal Rank Fusion score, higher is better */
  score: number;
  vecRank?: number;
  ftsRank?: number;
}

export interface DocumentSummary {
  docId: string;
  docName: string;
  chunkCount: number;
}

export function mapDbChunkToRecord(row: DbChunk): ChunkRecord {
  return {
    chunkId: row.chunk_id,
    docId: row.doc_id,
    docName: row.doc_name,
    chunkNumber: row.chunk_number,
    content: row.content,
    reason: row.reason,
  };
}
