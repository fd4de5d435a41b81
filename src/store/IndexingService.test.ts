import { createFsFromVolume, vol } from "memfs";
import { beforeEach, describe, expect, it, vi } from "vitest";
import type { AppConfig } from "../config";
import { StoreError } from "./errors";

vi.mock("node:fs", () => ({ default: createFsFromVolume(vol) }));
vi.mock("node:fs/promises", () => ({ default: vol.promises }));
vi.mock("../utils/logger");

const mockStore = {
  initialize: vi.fn(),
  shutdown: vi.fn(),
  upsert: vi.fn(),
  replaceDocument: vi.fn(),
  query: vi.fn(),
  checkDocumentExists: vi.fn(),
  deleteByDocId: vi.fn(),
  deleteByDocName: vi.fn(),
  listDocuments: vi.fn(),
  clear: vi.fn(),
};
vi.mock("./DocumentStore", () => ({
  DocumentStore: vi.fn(function () {
    return mockStore;
  }),
}));

const mockConverter = {
  convertToFile: vi.fn(),
};
vi.mock("../converter/MarkdownConverter", () => ({
  MarkdownConverter: vi.fn(function () {
    return mockConverter;
  }),
}));

import { DocumentStore } from "./DocumentStore";
import { IndexingService, docIdFor } from "./IndexingService";

const config: AppConfig = {
  storePath: "/store",
  embedding: {
    model: "text-embedding-3-small",
    openai: { apiKey: "test-key" },
    azure: {},
  },
  outputDir: "/rag_out",
  chunk: { softLimit: 300, hardLimit: 800 },
  chat: { apiKey: "test-key", baseURL: "https://llm.example.com/v1", model: "test-model" },
  contentUnderstanding: {
    apiVersion: "2024-12-01-preview",
    analyzerId: "prebuilt-documentAnalyzer",
    pollIntervalMs: 1,
    timeoutMs: 1000,
  },
};

describe("docIdFor", () => {
  it("should encode the name as URL-safe base64 with padding", () => {
    expect(docIdFor("guide.md")).toBe("Z3VpZGUubWQ=");
    expect(docIdFor("report.pdf")).toBe("cmVwb3J0LnBkZg==");
  });

  it("should replace + and / with - and _", () => {
    expect(docIdFor("??>")).toBe("Pz8-");
    expect(docIdFor("???")).toBe("Pz8_");
  });
});

describe("IndexingService", () => {
  let service: IndexingService;

  beforeEach(() => {
    vi.clearAllMocks();
    vol.reset();
    mockConverter.convertToFile.mockResolvedValue({
      markdown: "# Guide\n\nBody text.",
      sourcePath: "/docs/guide.md",
      method: "passthrough",
      markdownPath: "/out/guide.md.md",
    });
    mockStore.checkDocumentExists.mockResolvedValue(false);
    service = new IndexingService(config);
  });

  it("should open the database inside the store directory", () => {
    expect(vi.mocked(DocumentStore)).toHaveBeenCalledWith(
      "/store/documents.db",
      config.embedding,
    );
    expect(vol.existsSync("/store")).toBe(true);
  });

  it("should convert, chunk, save and store a new document", async () => {
    const result = await service.indexFile("/docs/guide.md", { outputDir: "/out" });

    expect(result).toEqual({
      docId: "Z3VpZGUubWQ=",
      docName: "guide.md",
      chunkCount: 1,
      markdownPath: "/out/guide.md.md",
      chunkDir: "/out/guide.md",
      skipped: false,
    });
    expect(mockConverter.convertToFile).toHaveBeenCalledWith("/docs/guide.md", "/out");
    expect(vol.readFileSync("/out/guide.md/chunk_1.md", "utf-8")).toBe("# Guide\n\nBody text.");
    expect(vol.readFileSync("/out/guide.md/chunks.log", "utf-8")).toBe(
      "chunk_1.md\t4 tokens\tcontent under heading level 1\n",
    );
    expect(mockStore.upsert).toHaveBeenCalledWith("Z3VpZGUubWQ=", "guide.md", [
      expect.objectContaining({ content: "# Guide\n\nBody text." }),
    ]);
  });

  it("should use the configured output directory by default", async () => {
    await service.indexFile("/docs/guide.md");
    expect(mockConverter.convertToFile).toHaveBeenCalledWith("/docs/guide.md", "/rag_out");
  });

  it("should skip a document that is already indexed", async () => {
    mockStore.checkDocumentExists.mockResolvedValue(true);

    const result = await service.indexFile("/docs/guide.md", { outputDir: "/out" });

    expect(result.skipped).toBe(true);
    expect(mockStore.checkDocumentExists).toHaveBeenCalledWith("Z3VpZGUubWQ=");
    expect(mockStore.deleteByDocId).not.toHaveBeenCalled();
    expect(mockStore.upsert).not.toHaveBeenCalled();
  });

  it("should replace an indexed document when reindexing", async () => {
    mockStore.checkDocumentExists.mockResolvedValue(true);
    mockStore.replaceDocument.mockResolvedValue(3);

    const result = await service.indexFile("/docs/guide.md", { outputDir: "/out", reindex: true });

    expect(result.skipped).toBe(false);
    expect(mockStore.replaceDocument).toHaveBeenCalledWith("Z3VpZGUubWQ=", "guide.md", [
      expect.objectContaining({ content: "# Guide\n\nBody text." }),
    ]);
    expect(mockStore.deleteByDocId).not.toHaveBeenCalled();
    expect(mockStore.upsert).not.toHaveBeenCalled();
  });

  it("should not delete the indexed document when reindexing fails", async () => {
    mockStore.checkDocumentExists.mockResolvedValue(true);
    mockStore.replaceDocument.mockRejectedValue(new StoreError("rate limited"));

    await expect(
      service.indexFile("/docs/guide.md", { outputDir: "/out", reindex: true }),
    ).rejects.toThrow("rate limited");
    expect(mockStore.deleteByDocId).not.toHaveBeenCalled();
    expect(mockStore.deleteByDocName).not.toHaveBeenCalled();
  });

  describe("removeDocument", () => {
    it("should remove by id or by name", async () => {
      mockStore.deleteByDocId.mockResolvedValue(2);
      mockStore.deleteByDocName.mockResolvedValue(5);

      await expect(service.removeDocument({ docId: "Z3VpZGUubWQ=" })).resolves.toBe(2);
      await expect(service.removeDocument({ docName: "guide.md" })).resolves.toBe(5);
      expect(mockStore.deleteByDocName).toHaveBeenCalledWith("guide.md");
    });

    it("should require exactly one target", async () => {
      await expect(service.removeDocument({})).rejects.toThrow(StoreError);
      await expect(
        service.removeDocument({ docId: "Z3VpZGUubWQ=", docName: "guide.md" }),
      ).rejects.toThrow("Specify either a document id or a document name, not both");
    });
  });

  it("should delegate search, listing and lifecycle to the store", async () => {
    mockStore.query.mockResolvedValue([]);
    mockStore.listDocuments.mockResolvedValue([
      { docId: "Z3VpZGUubWQ=", docName: "guide.md", chunkCount: 1 },
    ]);

    await service.initialize();
    await expect(service.search("install", 3)).resolves.toEqual([]);
    await expect(service.listDocuments()).resolves.toHaveLength(1);
    await service.shutdown();

    expect(mockStore.initialize).toHaveBeenCalled();
    expect(mockStore.query).toHaveBeenCalledWith("install", 3);
    expect(mockStore.shutdown).toHaveBeenCalled();
  });
});
