import envPaths from "env-paths";
import { z } from "zod";
import { ConfigError } from "./utils/errors";

/** Default soft token limit for chunking */
export const DEFAULT_CHUNK_SOFT_LIMIT = 300;

/** Default hard token limit for chunking */
export const DEFAULT_CHUNK_HARD_LIMIT = 800;

/** Embedding model used when MD_RAG_EMBEDDING_MODEL is not set */
export const DEFAULT_EMBEDDING_MODEL = "text-embedding-3-small";

/** Where converted markdown and chunk folders are written */
export const DEFAULT_OUTPUT_DIR = "./rag_md_out";

export const DEFAULT_CHAT_BASE_URL = "https://api.openai.com/v1";
export const DEFAULT_VISION_MODEL = "gpt-4o";

export const DEFAULT_CONTENT_UNDERSTANDING_API_VERSION = "2024-12-01-preview";
export const DEFAULT_ANALYZER_ID = "prebuilt-documentAnalyzer";

/** Interval between polls of a running analyze operation */
export const DEFAULT_POLL_INTERVAL_MS = 2000;

/** Give up on an analyze operation after this long */
export const DEFAULT_POLL_TIMEOUT_MS = 300_000;

export interface ChunkLimits {
  softLimit: number;
  hardLimit: number;
}

/**
 * Embedding model and the credentials of its provider. The model is a
 * "provider:model" string; a bare model name means OpenAI.
 */
export interface EmbeddingSettings {
  model: string;
  openai: {
    apiKey?: string;
    baseURL?: string;
  };
  azure: {
    apiKey?: string;
    instanceName?: string;
    apiVersion?: string;
  };
}

export interface ChatSettings {
  apiKey?: string;
  baseURL: string;
  model: string;
}

export interface ContentUnderstandingSettings {
  endpoint?: string;
  apiKey?: string;
  apiVersion: string;
  analyzerId: string;
  pollIntervalMs: number;
  timeoutMs: number;
}

/**
 * Process-wide settings, built once at start-up and passed to each service.
 */
export interface AppConfig {
  /** Directory holding documents.db */
  storePath: string;
  embedding: EmbeddingSettings;
  outputDir: string;
  chunk: ChunkLimits;
  chat: ChatSettings;
  contentUnderstanding: ContentUnderstandingSettings;
}

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value?.trim() ? value.trim() : undefined));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  MD_RAG_STORE_PATH: optionalString,
  MD_RAG_EMBEDDING_MODEL: optionalString,
  MD_RAG_OUTPUT_DIR: optionalString,
  MD_RAG_CHUNK_SOFT_LIMIT: positiveInt(DEFAULT_CHUNK_SOFT_LIMIT),
  MD_RAG_CHUNK_HARD_LIMIT: positiveInt(DEFAULT_CHUNK_HARD_LIMIT),
  OPENAI_API_KEY: optionalString,
  OPENAI_API_BASE: optionalString,
  OPENAI_EMBEDDING_API_BASE: optionalString,
  AZURE_OPENAI_API_KEY: optionalString,
  AZURE_OPENAI_API_INSTANCE_NAME: optionalString,
  AZURE_OPENAI_API_VERSION: optionalString,
  MODEL_ID: optionalString,
  CONTENT_UNDERSTANDING_ENDPOINT: optionalString,
  CONTENT_UNDERSTANDING_KEY: optionalString,
  CONTENT_UNDERSTANDING_API_VERSION: optionalString,
  CONTENT_UNDERSTANDING_ANALYZER_ID: optionalString,
  CONTENT_UNDERSTANDING_POLL_INTERVAL_MS: positiveInt(DEFAULT_POLL_INTERVAL_MS),
  CONTENT_UNDERSTANDING_TIMEOUT_MS: positiveInt(DEFAULT_POLL_TIMEOUT_MS),
});

/**
 * Builds the application configuration from environment variables.
 * @throws {ConfigError} If a variable is present but invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  const vars = parsed.data;

  return {
    storePath: vars.MD_RAG_STORE_PATH ?? envPaths("md-rag-ingest", { suffix: "" }).data,
    embedding: {
      model: vars.MD_RAG_EMBEDDING_MODEL ?? DEFAULT_EMBEDDING_MODEL,
      openai: {
        apiKey: vars.OPENAI_API_KEY,
        baseURL: vars.OPENAI_EMBEDDING_API_BASE,
      },
      azure: {
        apiKey: vars.AZURE_OPENAI_API_KEY,
        instanceName: vars.AZURE_OPENAI_API_INSTANCE_NAME,
        apiVersion: vars.AZURE_OPENAI_API_VERSION,
      },
    },
    outputDir: vars.MD_RAG_OUTPUT_DIR ?? DEFAULT_OUTPUT_DIR,
    chunk: {
      softLimit: vars.MD_RAG_CHUNK_SOFT_LIMIT,
      hardLimit: vars.MD_RAG_CHUNK_HARD_LIMIT,
    },
    chat: {
      apiKey: vars.OPENAI_API_KEY,
      baseURL: vars.OPENAI_API_BASE ?? DEFAULT_CHAT_BASE_URL,
      model: vars.MODEL_ID ?? DEFAULT_VISION_MODEL,
    },
    contentUnderstanding: {
      endpoint: vars.CONTENT_UNDERSTANDING_ENDPOINT,
      apiKey: vars.CONTENT_UNDERSTANDING_KEY,
      apiVersion:
        vars.CONTENT_UNDERSTANDING_API_VERSION ?? DEFAULT_CONTENT_UNDERSTANDING_API_VERSION,
      analyzerId: vars.CONTENT_UNDERSTANDING_ANALYZER_ID ?? DEFAULT_ANALYZER_ID,
      pollIntervalMs: vars.CONTENT_UNDERSTANDING_POLL_INTERVAL_MS,
      timeoutMs: vars.CONTENT_UNDERSTANDING_TIMEOUT_MS,
    },
  };
}
