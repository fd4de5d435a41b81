export { DocumentStore, chunkIdFor, escapeFtsQuery, rankResults } from "./DocumentStore";
export {
  ModelConfigurationError,
  UnsupportedProviderError,
  createEmbeddingModel,
} from "./embeddings/EmbeddingFactory";
export { FixedDimensionEmbeddings } from "./embeddings/FixedDimensionEmbeddings";
export { ConnectionError, DimensionError, DocumentNotFoundError, StoreError } from "./errors";
export { DB_FILE_NAME, IndexingService, docIdFor } from "./IndexingService";
export type { IndexOptions, IndexResult } from "./IndexingService";
export { VECTOR_DIMENSION } from "./schema";
export type { ChunkRecord, DocumentSummary, SearchResult } from "./types";
