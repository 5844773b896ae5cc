import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { IngestionError } from "../src/domain/errors.js";
import { InMemoryVectorStore } from "../src/infra/store/inMemoryVectorStore.js";
import { IndexService } from "../src/services/indexService.js";
import { FakeAiClient } from "./support/fakes.js";

class SlowEmbeddingClient extends FakeAiClient {
  active = 0;

  maxActive = 0;

  async embedTexts(texts: string[]): Promise<number[][]> {
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    await new Promise((resolve) => setTimeout(resolve, 5));
    this.active -= 1;
    return super.embedTexts(texts);
  }
}

describe("IndexService", () => {
  let docsDir: string;

  beforeEach(async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    docsDir = await fs.mkdtemp(path.join(os.tmpdir(), "index-service-"));
    await fs.writeFile(
      path.join(docsDir, "company.txt"),
      "Acme AI builds chatbot automation for retail teams.",
      "utf-8",
    );
    await fs.writeFile(
      path.join(docsDir, "pricing.md"),
      "Pricing starts with a free pilot. Support is included.",
      "utf-8",
    );
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(docsDir, { recursive: true, force: true });
  });

  const createService = (ai = new FakeAiClient(), store = new InMemoryVectorStore()) =>
    new IndexService({
      embeddings: ai,
      vectorStore: store,
      documentsDir: docsDir,
      chunkSize: 1000,
      chunkOverlap: 200,
    });

  it("starts uninitialized", () => {
    const service = createService();

    expect(service.getSnapshot()).toBeNull();
    expect(service.getStatus()).toEqual({
      lifecycle: "uninitialized",
      mode: null,
      chunkCount: 0,
      documentCount: 0,
      documents: [],
      builtAt: null,
    });
  });

  it("builds a vector snapshot when embeddings are configured", async () => {
    const store = new InMemoryVectorStore();
    const service = createService(new FakeAiClient(), store);

    const summary = await service.initializeDocuments();

    expect(summary).toEqual({
      mode: "vector",
      chunkCount: 2,
      documentCount: 2,
      documents: ["company.txt", "pricing.md"],
    });
    expect(service.getLifecycle()).toBe("populated");
    expect(await store.stats()).toEqual({ chunkCount: 2, sources: ["company.txt", "pricing.md"] });
  });

  it("produces the same index when initialized twice", async () => {
    const service = createService();

    const first = await service.initializeDocuments();
    const second = await service.initializeDocuments();

    expect(second).toEqual(first);
    expect(service.getStatus().chunkCount).toBe(2);
  });

  it("degrades to keyword mode when embedding fails", async () => {
    const ai = new FakeAiClient();
    ai.failEmbedTexts = true;
    const service = createService(ai);

    const summary = await service.initializeDocuments();

    expect(summary.mode).toBe("keyword");
    expect(service.getSnapshot()?.keywordIndex.size).toBe(2);
  });

  it("uses keyword mode without calling the embedder when embeddings are off", async () => {
    const ai = new FakeAiClient();
    ai.embeddingConfigured = false;
    const service = createService(ai);

    expect((await service.initializeDocuments()).mode).toBe("keyword");
    expect(ai.embedTextsCalls).toBe(0);
  });

  it("keeps the previous snapshot when a rebuild fails", async () => {
    const service = createService();
    await service.initializeDocuments();
    const previous = service.getSnapshot();

    await fs.rm(docsDir, { recursive: true, force: true });

    await expect(service.initializeDocuments()).rejects.toBeInstanceOf(IngestionError);
    expect(service.getSnapshot()).toBe(previous);
    expect(service.getLifecycle()).toBe("populated");
  });

  it("serves the previous snapshot while a rebuild runs", async () => {
    const service = createService(new SlowEmbeddingClient());
    await service.initializeDocuments();
    const previous = service.getSnapshot();

    const rebuild = service.initializeDocuments();
    expect(service.getLifecycle()).toBe("rebuilding");
    expect(service.getSnapshot()).toBe(previous);

    await rebuild;
    expect(service.getLifecycle()).toBe("populated");
    expect(service.getSnapshot()).not.toBe(previous);
  });

  it("runs concurrent rebuilds one at a time", async () => {
    const ai = new SlowEmbeddingClient();
    const service = createService(ai);

    const [first, second] = await Promise.all([
      service.initializeDocuments(),
      service.initializeDocuments(),
    ]);

    expect(ai.maxActive).toBe(1);
    expect(ai.embedTextsCalls).toBe(2);
    expect(second).toEqual(first);
  });

  it("restores a populated vector store without re-embedding", async () => {
    const ai = new FakeAiClient();
    const store = new InMemoryVectorStore();
    await store.replaceAll([
      { content: "Stored chunk", source: "stored.txt", sequenceNo: 0, embedding: [1] },
    ]);
    const service = createService(ai, store);

    const status = await service.restoreOrInitialize();

    expect(status.mode).toBe("vector");
    expect(status.documents).toEqual(["stored.txt"]);
    expect(ai.embedTextsCalls).toBe(0);
  });

  it("initializes from documents when the store is empty", async () => {
    const service = createService();

    const status = await service.restoreOrInitialize();

    expect(status.lifecycle).toBe("populated");
    expect(status.chunkCount).toBe(2);
  });

  it("stays uninitialized when startup indexing fails", async () => {
    await fs.rm(docsDir, { recursive: true, force: true });
    const service = createService();

    const status = await service.restoreOrInitialize();

    expect(status.lifecycle).toBe("uninitialized");
    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining("[index] startup indexing failed"),
    );
  });
});
