/** Fixed width of the vector column; shorter embeddings are zero-padded */
export const VECTOR_DIMENSION = 1536;

/** Chunks shorter than this are indexed for full-text search only */
export const MIN_EMBEDDING_LENGTH = 10;

export const createTablesSQL = `
  -- One row per chunk
  CREATE TABLE IF NOT EXISTS chunks(
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    chunk_id TEXT NOT NULL UNIQUE,
    doc_id TEXT NOT NULL,
    doc_name TEXT NOT NULL,
    chunk_number INTEGER NOT NULL,
    content TEXT NOT NULL,
    reason TEXT NOT NULL DEFAULT ''
  );

  CREATE INDEX IF NOT EXISTS idx_chunks_doc_id ON chunks(doc_id);
  CREATE INDEX IF NOT EXISTS idx_chunks_doc_name ON chunks(doc_name);

  -- Embeddings, keyed by chunks.id
  CREATE VIRTUAL TABLE IF NOT EXISTS chunks_vec USING vec0(
    embedding FLOAT[${VECTOR_DIMENSION}]
  );

  CREATE VIRTUAL TABLE IF NOT EXISTS chunks_fts USING fts5(
    content,
    doc_name,
    tokenize='porter unicode61',
    content='chunks',
    content_rowid='id'
  );

  CREATE TRIGGER IF NOT EXISTS chunks_after_delete AFTER DELETE ON chunks BEGIN
    INSERT INTO chunks_fts(chunks_fts, rowid, content, doc_name)
    VALUES('delete', old.id, old.content, old.doc_name);
    DELETE FROM chunks_vec WHERE rowid = old.id;
  END;

  CREATE TRIGGER IF NOT EXISTS chunks_after_insert AFTER INSERT ON chunks BEGIN
    INSERT INTO chunks_fts(rowid, content, doc_name)
    VALUES(new.id, new.content, new.doc_name);
  END;
`;
